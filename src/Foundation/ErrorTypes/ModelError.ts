/**
 * ModelError.ts
 *
 * Collaborator initialization or inference failures.
 */

import { SDKError } from './SDKError';
import { ErrorCode } from './ErrorCodes';

export class ModelError extends SDKError {
  static providerNotFound(serviceType: string, modelVersion?: string): ModelError {
    const suffix = modelVersion ? ` for model ${modelVersion}` : '';
    return new ModelError(
      ErrorCode.ProviderNotFound,
      `No ${serviceType} provider registered${suffix}. Register a provider or pass precomputed output.`,
      { details: { serviceType, modelVersion } }
    );
  }

  static initializationFailed(serviceName: string, cause: Error): ModelError {
    return new ModelError(
      ErrorCode.ModelInitializationFailed,
      `${serviceName} initialization failed: ${cause.message}`,
      { underlyingError: cause, details: { serviceName } }
    );
  }

  static diarizationFailed(cause: Error): ModelError {
    return new ModelError(
      ErrorCode.DiarizationFailed,
      `Speaker diarization failed: ${cause.message}`,
      { underlyingError: cause }
    );
  }

  static transcriptionFailed(cause: Error): ModelError {
    return new ModelError(
      ErrorCode.TranscriptionFailed,
      `Transcription failed: ${cause.message}`,
      { underlyingError: cause }
    );
  }

  static notInitialized(serviceName: string): ModelError {
    return new ModelError(
      ErrorCode.ServiceNotInitialized,
      `${serviceName} is not initialized. Call initialize() first.`,
      { details: { serviceName } }
    );
  }

  private constructor(
    code: ErrorCode,
    message: string,
    options?: { underlyingError?: Error; details?: Record<string, unknown> }
  ) {
    super(code, message, options);
    this.name = 'ModelError';
    Object.setPrototypeOf(this, ModelError.prototype);
  }
}
