/**
 * InputError.ts
 *
 * Malformed or unreadable input: audio files and precomputed collaborator output.
 */

import { SDKError } from './SDKError';
import { ErrorCode } from './ErrorCodes';

export class InputError extends SDKError {
  static fileNotFound(path: string, cause?: Error): InputError {
    return new InputError(ErrorCode.FileNotFound, `File not found: ${path}`, {
      underlyingError: cause,
      details: { path },
    });
  }

  static unreadable(path: string, cause: Error): InputError {
    return new InputError(
      ErrorCode.InvalidInput,
      `Failed to read ${path}: ${cause.message}`,
      { underlyingError: cause, details: { path } }
    );
  }

  static unsupportedAudioFormat(path: string, reason: string): InputError {
    return new InputError(
      ErrorCode.UnsupportedAudioFormat,
      `Unsupported audio format in ${path}: ${reason}`,
      { details: { path, reason } }
    );
  }

  static malformedAudio(path: string, reason: string): InputError {
    return new InputError(
      ErrorCode.MalformedAudioFile,
      `Malformed audio file ${path}: ${reason}`,
      { details: { path, reason } }
    );
  }

  static malformedCollaboratorOutput(
    path: string,
    reason: string,
    cause?: Error
  ): InputError {
    return new InputError(
      ErrorCode.MalformedCollaboratorOutput,
      `Malformed data in ${path}: ${reason}`,
      { underlyingError: cause, details: { path, reason } }
    );
  }

  private constructor(
    code: ErrorCode,
    message: string,
    options?: { underlyingError?: Error; details?: Record<string, unknown> }
  ) {
    super(code, message, options);
    this.name = 'InputError';
    Object.setPrototypeOf(this, InputError.prototype);
  }
}
