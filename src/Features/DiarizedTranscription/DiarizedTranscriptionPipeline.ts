/**
 * DiarizedTranscriptionPipeline.ts
 *
 * audio load -> speaker diarization -> transcription -> segment merge
 *
 * Diarization and transcription depend only on the decoded audio, so they
 * can run concurrently (`runStagesConcurrently`); the merge needs both.
 * Stage latencies are measured per stage either way.
 */

import type { LoadedAudio } from '../../Core/Models/Audio/LoadedAudio';
import {
  type SpeakerDiarizationResult,
  distinctSpeakers,
} from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type { STTTranscriptionResult } from '../../Core/Models/STT/STTTranscriptionResult';
import type { AudioLoader } from '../../Core/Protocols/Audio/AudioLoader';
import type { SpeakerDiarizationService } from '../../Core/Protocols/Voice/SpeakerDiarizationService';
import {
  type AsrModelVersion,
  type STTService,
  describeModelVersion,
} from '../../Core/Protocols/Voice/STTService';
import type { DiarizeTranscribeConfiguration } from '../../Foundation/Configuration/DiarizeTranscribeConfiguration';
import { ServiceRegistry } from '../../Foundation/DependencyInjection/ServiceRegistry';
import { InputError } from '../../Foundation/ErrorTypes/InputError';
import { ModelError } from '../../Foundation/ErrorTypes/ModelError';
import {
  type SDKError,
  asSDKError,
  isSDKError,
  toError,
} from '../../Foundation/ErrorTypes/SDKError';
import type { PipelineEventEmitter, PipelineStage } from '../../Foundation/Events/PipelineEvents';
import { SDKLogger } from '../../Foundation/Logging/Logger/SDKLogger';
import { WavFileLoader } from '../../Infrastructure/Audio/WavFileLoader';
import { mergeSpeakerAndTranscript } from '../SegmentMerge/SegmentMerger';
import type { TranscriptSegment } from '../SegmentMerge/SegmentMergeModels';
import { type DiarizedTranscript, formatRealTimeFactor } from './DiarizedTranscriptModels';

export interface DiarizedTranscriptionDependencies {
  readonly audioLoader: AudioLoader;
  readonly diarizationService: SpeakerDiarizationService;
  readonly sttService: STTService;
  /** Receives stage progress events */
  readonly events?: PipelineEventEmitter;
  /** Millisecond clock */
  readonly now?: () => number;
}

interface StageResult<T> {
  readonly value: T;
  readonly durationMs: number;
}

export class DiarizedTranscriptionPipeline {
  private readonly logger = new SDKLogger('DiarizeTranscribe');
  private readonly audioLoader: AudioLoader;
  private readonly diarizationService: SpeakerDiarizationService;
  private readonly sttService: STTService;
  private readonly events: PipelineEventEmitter | null;
  private readonly now: () => number;

  constructor(dependencies: DiarizedTranscriptionDependencies) {
    this.audioLoader = dependencies.audioLoader;
    this.diarizationService = dependencies.diarizationService;
    this.sttService = dependencies.sttService;
    this.events = dependencies.events ?? null;
    this.now = dependencies.now ?? Date.now;
  }

  /**
   * Build a pipeline from the providers registered in `registry`.
   *
   * @throws ModelError when no diarization provider, or no STT provider for
   * `modelVersion`, is registered
   */
  static async fromRegistry(options: {
    modelVersion: AsrModelVersion;
    registry?: ServiceRegistry;
    audioLoader?: AudioLoader;
    events?: PipelineEventEmitter;
  }): Promise<DiarizedTranscriptionPipeline> {
    const registry = options.registry ?? ServiceRegistry.shared;

    const diarizationProvider = registry.speakerDiarizationProvider();
    if (!diarizationProvider) {
      throw ModelError.providerNotFound('speaker diarization');
    }
    const sttProvider = registry.sttProvider(options.modelVersion);
    if (!sttProvider) {
      throw ModelError.providerNotFound('STT', options.modelVersion);
    }

    return new DiarizedTranscriptionPipeline({
      audioLoader: options.audioLoader ?? new WavFileLoader(),
      diarizationService: await diarizationProvider.createSpeakerDiarizationService(),
      sttService: await sttProvider.createSTTService(),
      events: options.events,
    });
  }

  /**
   * Run every stage for one audio file.
   *
   * @throws InputError, ModelError or ValidationError (from the merge's
   * precondition check); other failures are wrapped with asSDKError
   */
  async process(
    audioPath: string,
    configuration: DiarizeTranscribeConfiguration
  ): Promise<DiarizedTranscript> {
    try {
      return await this.runStages(audioPath, configuration);
    } catch (error) {
      if (error instanceof StageFailure) {
        this.events?.emit('pipeline.failed', { stage: error.stage, error: error.error });
        throw error.error;
      }
      throw error;
    }
  }

  private async runStages(
    audioPath: string,
    configuration: DiarizeTranscribeConfiguration
  ): Promise<DiarizedTranscript> {
    const totalStart = this.now();

    this.logger.info(`Processing audio file: ${audioPath}`, {
      clusteringThreshold: configuration.clusteringThreshold,
      modelVersion: describeModelVersion(configuration.modelVersion),
    });

    const audio = await this.runStage(
      'audio',
      () => this.loadAudio(audioPath),
      (loaded) => ({ sampleCount: loaded.samples.length, durationSeconds: loaded.durationSeconds })
    );
    this.logger.info(
      `Loaded ${audio.value.samples.length} samples (${audio.value.durationSeconds.toFixed(2)}s)`
    );

    const diarizeStage = (): Promise<StageResult<SpeakerDiarizationResult>> =>
      this.runStage(
        'diarization',
        () => this.diarize(audio.value, configuration.clusteringThreshold),
        (result) => ({
          segmentCount: result.segments.length,
          speakerCount: distinctSpeakers(result.segments).length,
        })
      );
    const transcribeStage = (): Promise<StageResult<STTTranscriptionResult>> =>
      this.runStage(
        'transcription',
        () => this.transcribe(audio.value, configuration.modelVersion),
        (result) => ({
          characterCount: result.text.length,
          tokenCount: result.tokenTimings?.length ?? 0,
        })
      );

    let diarization: StageResult<SpeakerDiarizationResult>;
    let transcription: StageResult<STTTranscriptionResult>;
    if (configuration.runStagesConcurrently) {
      // Both stages settle (and clean up) before a failure is reported
      const [diarizationOutcome, transcriptionOutcome] = await Promise.allSettled([
        diarizeStage(),
        transcribeStage(),
      ]);
      if (diarizationOutcome.status === 'rejected') {
        if (transcriptionOutcome.status === 'rejected') {
          this.logger.warning(
            `Concurrent transcription stage also failed: ${describeFailure(transcriptionOutcome.reason)}`
          );
        }
        throw diarizationOutcome.reason;
      }
      if (transcriptionOutcome.status === 'rejected') {
        throw transcriptionOutcome.reason;
      }
      diarization = diarizationOutcome.value;
      transcription = transcriptionOutcome.value;
    } else {
      diarization = await diarizeStage();
      transcription = await transcribeStage();
    }

    const speakers = distinctSpeakers(diarization.value.segments);
    this.logger.info(
      `Found ${diarization.value.segments.length} segments from ${speakers.length} speakers`,
      { processingTime: seconds(diarization.durationMs) }
    );
    this.logger.info(`Transcription complete: ${transcription.value.text.slice(0, 100)}...`, {
      processingTime: seconds(transcription.durationMs),
    });
    if (transcription.value.tokenTimings === null || transcription.value.tokenTimings.length === 0) {
      this.logger.warning('Transcription has no token timings; emitting one empty segment per speaker interval');
    }

    const merged = await this.runStage(
      'merge',
      async () =>
        mergeSpeakerAndTranscript(
          diarization.value,
          transcription.value,
          configuration.includeWordTimings
        ),
      (segments: TranscriptSegment[]) => ({ segmentCount: segments.length })
    );

    const processingTime = seconds(this.now() - totalStart);
    const durationSeconds = audio.value.durationSeconds;

    this.logger.info(`Created ${merged.value.length} speaker-attributed segments`);
    this.logger.info(`Total processing time: ${processingTime.toFixed(2)}s`, {
      rtfx: formatRealTimeFactor(durationSeconds, processingTime),
    });

    this.events?.emit('pipeline.completed', {
      audioFile: audioPath,
      segmentCount: merged.value.length,
      processingTimeMs: processingTime * 1000,
    });

    return {
      segments: merged.value,
      metadata: {
        audioFile: audioPath,
        durationSeconds,
        speakerCount: speakers.length,
        speakers,
        processingTime,
        diarizationTime: seconds(diarization.durationMs),
        transcriptionTime: seconds(transcription.durationMs),
        clusteringThreshold: configuration.clusteringThreshold,
        modelVersion: configuration.modelVersion,
      },
    };
  }

  // ============================================================================
  // Stages
  // ============================================================================

  private async loadAudio(audioPath: string): Promise<LoadedAudio> {
    try {
      return await this.audioLoader.load(audioPath);
    } catch (error) {
      throw error instanceof InputError ? error : InputError.unreadable(audioPath, toError(error));
    }
  }

  private async diarize(
    audio: LoadedAudio,
    clusteringThreshold: number
  ): Promise<SpeakerDiarizationResult> {
    const service = this.diarizationService;
    try {
      await this.initializeService(service.name, () => service.initialize({ clusteringThreshold }));
      try {
        return await service.diarize(audio.samples, audio.sampleRate);
      } catch (error) {
        throw isSDKError(error) ? error : ModelError.diarizationFailed(toError(error));
      }
    } finally {
      await this.cleanupService(service.name, () => service.cleanup());
    }
  }

  private async transcribe(
    audio: LoadedAudio,
    modelVersion: AsrModelVersion
  ): Promise<STTTranscriptionResult> {
    const service = this.sttService;
    try {
      await this.initializeService(service.name, () => service.initialize({ modelVersion }));
      try {
        return await service.transcribe(audio.samples, audio.sampleRate);
      } catch (error) {
        throw isSDKError(error) ? error : ModelError.transcriptionFailed(toError(error));
      }
    } finally {
      await this.cleanupService(service.name, () => service.cleanup());
    }
  }

  private async initializeService(name: string, initialize: () => Promise<void>): Promise<void> {
    try {
      await initialize();
    } catch (error) {
      throw isSDKError(error) ? error : ModelError.initializationFailed(name, toError(error));
    }
  }

  /**
   * Cleanup failures are logged; they must not mask the stage's own outcome.
   */
  private async cleanupService(name: string, cleanup: () => Promise<void>): Promise<void> {
    try {
      await cleanup();
    } catch (error) {
      this.logger.warning(`${name} cleanup failed: ${toError(error).message}`);
    }
  }

  private async runStage<T>(
    stage: PipelineStage,
    work: () => Promise<T>,
    describe: (value: T) => Record<string, unknown>
  ): Promise<StageResult<T>> {
    this.events?.emit('stage.started', { stage });
    const start = this.now();

    let value: T;
    try {
      value = await work();
    } catch (error) {
      throw new StageFailure(stage, asSDKError(error));
    }

    const durationMs = this.now() - start;
    this.events?.emit('stage.completed', { stage, durationMs, detail: describe(value) });
    this.logger.debug(`Stage ${stage} completed`, { durationMs });
    return { value, durationMs };
  }
}

/**
 * Carries a stage's error up to `process`, which reports it once.
 */
class StageFailure extends Error {
  readonly stage: PipelineStage;
  readonly error: SDKError;

  constructor(stage: PipelineStage, error: SDKError) {
    super(error.message);
    this.name = 'StageFailure';
    this.stage = stage;
    this.error = error;
    Object.setPrototypeOf(this, StageFailure.prototype);
  }
}

function describeFailure(reason: unknown): string {
  return reason instanceof StageFailure ? reason.error.message : toError(reason).message;
}

function seconds(milliseconds: number): number {
  return milliseconds / 1000;
}
