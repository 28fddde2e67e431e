/**
 * SDKError.ts
 *
 * Base error class for the package. Every error raised by the pipeline, its
 * collaborators or the merger's precondition check extends this class.
 */

import { ErrorCode, getErrorCodeMessage } from './ErrorCodes';
import {
  ErrorCategory,
  getCategoryFromCode,
  inferCategoryFromError,
} from './ErrorCategory';

export interface SDKErrorOptions {
  underlyingError?: Error;
  category?: ErrorCategory;
  details?: Record<string, unknown>;
}

/**
 * Base SDK error interface.
 */
export interface SDKErrorProtocol {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Error category for filtering */
  readonly category: ErrorCategory;
  /** Original error that caused this error */
  readonly underlyingError?: Error;
  /** Structured details about the failure */
  readonly details?: Record<string, unknown>;
}

export class SDKError extends Error implements SDKErrorProtocol {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly underlyingError?: Error;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, options?: SDKErrorOptions) {
    super(message ?? getErrorCodeMessage(code));

    this.name = 'SDKError';
    this.code = code;
    this.category = options?.category ?? getCategoryFromCode(code);
    this.underlyingError = options?.underlyingError;
    this.details = options?.details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, SDKError.prototype);
  }

  /**
   * Name of the error code, e.g. `FileWriteFailed`.
   */
  get codeName(): string {
    return ErrorCode[this.code] ?? 'Unknown';
  }

  /**
   * Flatten the error into log metadata.
   */
  toLogMetadata(): Record<string, unknown> {
    return {
      error_code: this.code,
      error_code_name: this.codeName,
      error_category: this.category,
      error_message: this.message,
      ...(this.details ?? {}),
      has_underlying_error: this.underlyingError !== undefined,
      underlying_error_name: this.underlyingError?.name,
      underlying_error_message: this.underlyingError?.message,
    };
  }
}

/**
 * Convert any thrown value to an SDKError.
 * SDKErrors pass through; anything else is wrapped and categorized.
 */
export function asSDKError(error: unknown): SDKError {
  if (error instanceof SDKError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const category = inferCategoryFromError(cause);

  return new SDKError(mapCategoryToCode(category), cause.message, {
    underlyingError: cause,
    category,
  });
}

function mapCategoryToCode(category: ErrorCategory): ErrorCode {
  switch (category) {
    case ErrorCategory.Input:
      return ErrorCode.InvalidInput;
    case ErrorCategory.Model:
      return ErrorCode.ModelInitializationFailed;
    case ErrorCategory.IO:
      return ErrorCode.FileWriteFailed;
    case ErrorCategory.Validation:
      return ErrorCode.ValidationFailed;
    case ErrorCategory.Unknown:
      return ErrorCode.Unknown;
  }
}

/**
 * Type guard to check if an error is an SDKError.
 */
export function isSDKError(error: unknown): error is SDKError {
  return error instanceof SDKError;
}

/**
 * Normalize a thrown value into an Error for use as an underlying cause.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
