/**
 * SpeakerDiarizationService.ts
 *
 * Protocol for Speaker Diarization service implementations
 */

import type { SpeakerDiarizationResult } from '../../Models/SpeakerDiarization/SpeakerDiarizationResult';

export interface SpeakerDiarizationOptions {
  /** Clustering threshold for speaker separation (0.0 to 1.0) */
  readonly clusteringThreshold: number;
}

export interface SpeakerDiarizationService {
  /** Service name, used in logs and errors */
  readonly name: string;

  /**
   * Load models and prepare the service
   */
  initialize(options: SpeakerDiarizationOptions): Promise<void>;

  /**
   * Attribute time ranges of the audio to speakers
   */
  diarize(samples: Float32Array, sampleRate: number): Promise<SpeakerDiarizationResult>;

  /**
   * Check if service is ready
   */
  readonly isReady: boolean;

  /**
   * Clean up and release resources
   */
  cleanup(): Promise<void>;
}
