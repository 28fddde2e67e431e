/**
 * PrecomputedServices.ts
 *
 * Diarization and STT services that replay collaborator output saved as JSON,
 * together with providers for registering them in the ServiceRegistry.
 * The audio passed to `diarize` / `transcribe` is not inspected.
 */

import type { SpeakerDiarizationResult } from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type { STTTranscriptionResult } from '../../Core/Models/STT/STTTranscriptionResult';
import type {
  SpeakerDiarizationOptions,
  SpeakerDiarizationService,
} from '../../Core/Protocols/Voice/SpeakerDiarizationService';
import type {
  AsrModelVersion,
  STTOptions,
  STTService,
} from '../../Core/Protocols/Voice/STTService';
import type {
  SpeakerDiarizationServiceProvider,
  STTServiceProvider,
} from '../../Core/Protocols/Voice/ServiceProviders';
import { ModelError } from '../../Foundation/ErrorTypes/ModelError';
import { SDKLogger } from '../../Foundation/Logging/Logger/SDKLogger';
import { readDiarizationFile, readTranscriptionFile } from './CollaboratorOutputParser';

const logger = new SDKLogger('Precomputed');

// ============================================================================
// Diarization
// ============================================================================

export class PrecomputedDiarizationService implements SpeakerDiarizationService {
  readonly name = 'PrecomputedDiarization';

  private result: SpeakerDiarizationResult | null = null;

  constructor(private readonly path: string) {}

  get isReady(): boolean {
    return this.result !== null;
  }

  async initialize(options: SpeakerDiarizationOptions): Promise<void> {
    this.result = await readDiarizationFile(this.path);
    logger.debug(`Loaded ${this.result.segments.length} diarization segments from ${this.path}`, {
      // The threshold was fixed when the file was produced
      requestedThreshold: options.clusteringThreshold,
    });
  }

  async diarize(_samples: Float32Array, _sampleRate: number): Promise<SpeakerDiarizationResult> {
    if (this.result === null) {
      throw ModelError.notInitialized(this.name);
    }
    return this.result;
  }

  async cleanup(): Promise<void> {
    this.result = null;
  }
}

export class PrecomputedDiarizationProvider implements SpeakerDiarizationServiceProvider {
  readonly name = 'PrecomputedDiarization';

  constructor(private readonly path: string) {}

  async createSpeakerDiarizationService(): Promise<SpeakerDiarizationService> {
    return new PrecomputedDiarizationService(this.path);
  }
}

// ============================================================================
// Transcription
// ============================================================================

export class PrecomputedTranscriptionService implements STTService {
  readonly name = 'PrecomputedTranscription';

  private result: STTTranscriptionResult | null = null;

  constructor(private readonly path: string) {}

  get isReady(): boolean {
    return this.result !== null;
  }

  async initialize(options: STTOptions): Promise<void> {
    this.result = await readTranscriptionFile(this.path);
    logger.debug(`Loaded transcription from ${this.path}`, {
      requestedModelVersion: options.modelVersion,
      tokenCount: this.result.tokenTimings?.length ?? 0,
    });
  }

  async transcribe(_samples: Float32Array, _sampleRate: number): Promise<STTTranscriptionResult> {
    if (this.result === null) {
      throw ModelError.notInitialized(this.name);
    }
    return this.result;
  }

  async cleanup(): Promise<void> {
    this.result = null;
  }
}

export class PrecomputedTranscriptionProvider implements STTServiceProvider {
  readonly name = 'PrecomputedTranscription';

  constructor(private readonly path: string) {}

  canHandle(_modelVersion: AsrModelVersion): boolean {
    return true;
  }

  async createSTTService(): Promise<STTService> {
    return new PrecomputedTranscriptionService(this.path);
  }
}
