/**
 * IOError.ts
 *
 * Output write failures.
 */

import { SDKError } from './SDKError';
import { ErrorCode } from './ErrorCodes';

export class IOError extends SDKError {
  static writeFailed(path: string, cause: Error): IOError {
    return new IOError(
      ErrorCode.FileWriteFailed,
      `Failed to write ${path}: ${cause.message}`,
      { underlyingError: cause, details: { path } }
    );
  }

  private constructor(
    code: ErrorCode,
    message: string,
    options?: { underlyingError?: Error; details?: Record<string, unknown> }
  ) {
    super(code, message, options);
    this.name = 'IOError';
    Object.setPrototypeOf(this, IOError.prototype);
  }
}
