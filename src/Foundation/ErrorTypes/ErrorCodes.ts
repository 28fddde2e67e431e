/**
 * ErrorCodes.ts
 *
 * Machine-readable error codes, grouped by range.
 */

export enum ErrorCode {
  Unknown = 0,

  // Input errors (1000-1099)
  InvalidInput = 1000,
  FileNotFound = 1001,
  UnsupportedAudioFormat = 1002,
  MalformedAudioFile = 1003,
  MalformedCollaboratorOutput = 1004,

  // Model errors (1100-1199)
  ProviderNotFound = 1100,
  ModelInitializationFailed = 1101,
  DiarizationFailed = 1102,
  TranscriptionFailed = 1103,
  ServiceNotInitialized = 1104,

  // IO errors (1200-1299)
  FileWriteFailed = 1200,

  // Validation errors (1300-1399)
  ValidationFailed = 1300,
  InvalidConfiguration = 1301,
}

/**
 * Default human-readable message for an error code.
 */
export function getErrorCodeMessage(code: ErrorCode): string {
  switch (code) {
    case ErrorCode.InvalidInput:
      return 'Invalid input';
    case ErrorCode.FileNotFound:
      return 'File not found';
    case ErrorCode.UnsupportedAudioFormat:
      return 'Unsupported audio format';
    case ErrorCode.MalformedAudioFile:
      return 'Malformed audio file';
    case ErrorCode.MalformedCollaboratorOutput:
      return 'Malformed collaborator output';
    case ErrorCode.ProviderNotFound:
      return 'No provider registered';
    case ErrorCode.ModelInitializationFailed:
      return 'Model initialization failed';
    case ErrorCode.DiarizationFailed:
      return 'Speaker diarization failed';
    case ErrorCode.TranscriptionFailed:
      return 'Transcription failed';
    case ErrorCode.ServiceNotInitialized:
      return 'Service not initialized';
    case ErrorCode.FileWriteFailed:
      return 'Failed to write file';
    case ErrorCode.ValidationFailed:
      return 'Validation failed';
    case ErrorCode.InvalidConfiguration:
      return 'Invalid configuration';
    case ErrorCode.Unknown:
      return 'Unknown error';
  }
}
