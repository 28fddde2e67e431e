/**
 * ServiceProviders.ts
 *
 * Protocols for registering external diarization and STT implementations
 */

import type { SpeakerDiarizationService } from './SpeakerDiarizationService';
import type { AsrModelVersion, STTService } from './STTService';

export interface SpeakerDiarizationServiceProvider {
  /** Provider name for identification */
  readonly name: string;

  createSpeakerDiarizationService(): Promise<SpeakerDiarizationService>;
}

export interface STTServiceProvider {
  readonly name: string;

  /**
   * Check if this provider can serve the given model version
   */
  canHandle(modelVersion: AsrModelVersion): boolean;

  createSTTService(): Promise<STTService>;
}
