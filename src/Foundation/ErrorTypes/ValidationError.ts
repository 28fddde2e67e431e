/**
 * ValidationError.ts
 *
 * Precondition violations in merge input or configuration. Carries every
 * issue found, not only the first.
 */

import { SDKError } from './SDKError';
import { ErrorCode } from './ErrorCodes';

export class ValidationError extends SDKError {
  readonly issues: readonly string[];

  static mergeInput(issues: readonly string[]): ValidationError {
    return new ValidationError(
      ErrorCode.ValidationFailed,
      `Invalid merge input: ${issues.join('; ')}`,
      issues
    );
  }

  static configuration(issues: readonly string[]): ValidationError {
    return new ValidationError(
      ErrorCode.InvalidConfiguration,
      `Invalid configuration: ${issues.join('; ')}`,
      issues
    );
  }

  private constructor(code: ErrorCode, message: string, issues: readonly string[]) {
    super(code, message, { details: { issues: [...issues] } });
    this.name = 'ValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
