/**
 * ErrorCategory.ts
 *
 * Broad error categories used for filtering and for CLI exit handling.
 */

import { ErrorCode } from './ErrorCodes';

export enum ErrorCategory {
  Input = 'input',
  Model = 'model',
  IO = 'io',
  Validation = 'validation',
  Unknown = 'unknown',
}

/**
 * Derive the category from an error code's range.
 */
export function getCategoryFromCode(code: ErrorCode): ErrorCategory {
  if (code >= 1000 && code < 1100) {
    return ErrorCategory.Input;
  }
  if (code >= 1100 && code < 1200) {
    return ErrorCategory.Model;
  }
  if (code >= 1200 && code < 1300) {
    return ErrorCategory.IO;
  }
  if (code >= 1300 && code < 1400) {
    return ErrorCategory.Validation;
  }
  return ErrorCategory.Unknown;
}

/**
 * Best-effort category for errors raised outside the SDK (Node system errors).
 */
export function inferCategoryFromError(error: Error): ErrorCategory {
  const code = getSystemErrorCode(error);
  if (code === 'ENOENT' || code === 'EISDIR') {
    return ErrorCategory.Input;
  }
  if (code === 'EACCES' || code === 'EPERM' || code === 'ENOSPC' || code === 'EROFS') {
    return ErrorCategory.IO;
  }
  return ErrorCategory.Unknown;
}

/**
 * `code` property of a Node system error, if any.
 */
export function getSystemErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}
