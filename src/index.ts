/**
 * diarized-transcript
 *
 * Speaker-attributed transcripts from diarization intervals and ASR token
 * timings.
 */

// Core models and collaborator protocols
export {
  type SpeakerInterval,
  type SpeakerDiarizationResult,
  distinctSpeakers,
} from './Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
export type { TokenTiming, STTTranscriptionResult } from './Core/Models/STT/STTTranscriptionResult';
export { type LoadedAudio, TARGET_SAMPLE_RATE } from './Core/Models/Audio/LoadedAudio';
export type { AudioLoader } from './Core/Protocols/Audio/AudioLoader';
export type {
  SpeakerDiarizationOptions,
  SpeakerDiarizationService,
} from './Core/Protocols/Voice/SpeakerDiarizationService';
export {
  type AsrModelVersion,
  type STTOptions,
  type STTService,
  describeModelVersion,
  parseModelVersion,
} from './Core/Protocols/Voice/STTService';
export type {
  SpeakerDiarizationServiceProvider,
  STTServiceProvider,
} from './Core/Protocols/Voice/ServiceProviders';

// Segment merge
export * from './Features/SegmentMerge';

// Pipeline
export {
  DiarizedTranscriptionPipeline,
  type DiarizedTranscriptionDependencies,
} from './Features/DiarizedTranscription/DiarizedTranscriptionPipeline';
export {
  type DiarizedTranscript,
  type TranscriptMetadata,
  realTimeFactor,
  formatRealTimeFactor,
} from './Features/DiarizedTranscription/DiarizedTranscriptModels';

// Foundation
export * from './Foundation/ErrorTypes';
export * from './Foundation/Logging';
export {
  ConfigurationEnvironment,
  DEFAULT_CLUSTERING_THRESHOLD,
  type DiarizeTranscribeConfiguration,
  type DiarizeTranscribeConfigurationOptions,
  DiarizeTranscribeConfigurationImpl,
  parseClusteringThreshold,
} from './Foundation/Configuration/DiarizeTranscribeConfiguration';
export {
  ServiceRegistry,
  DEFAULT_PROVIDER_PRIORITY,
} from './Foundation/DependencyInjection/ServiceRegistry';
export {
  PipelineEventEmitter,
  type PipelineStage,
  type PipelineEventMap,
  type StageStartedEvent,
  type StageCompletedEvent,
  type PipelineCompletedEvent,
  type PipelineFailedEvent,
} from './Foundation/Events/PipelineEvents';

// Infrastructure
export { WavFileLoader, decodeWav, resampleLinear } from './Infrastructure/Audio/WavFileLoader';
export {
  readDiarizationFile,
  readTranscriptionFile,
  parseDiarizationOutput,
  parseTranscriptionOutput,
} from './Infrastructure/Precomputed/CollaboratorOutputParser';
export {
  PrecomputedDiarizationService,
  PrecomputedDiarizationProvider,
  PrecomputedTranscriptionService,
  PrecomputedTranscriptionProvider,
} from './Infrastructure/Precomputed/PrecomputedServices';
export {
  serializeTranscript,
  formatTranscriptReport,
  sortKeys,
} from './Infrastructure/Serialization/TranscriptSerializer';
export { TranscriptWriter, expandHomeDirectory } from './Infrastructure/FileOutput/TranscriptWriter';

// CLI
export {
  runDiarizeTranscribe,
  parseArguments,
  usage,
  type ParsedArguments,
  type CommandContext,
} from './Public/Commands/DiarizeTranscribeCommand';
