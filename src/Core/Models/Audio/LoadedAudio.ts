/**
 * LoadedAudio.ts
 */

/** Sample rate expected by the diarization and STT collaborators. */
export const TARGET_SAMPLE_RATE = 16000;

export interface LoadedAudio {
  /** Mono PCM samples in [-1, 1] */
  readonly samples: Float32Array;
  /** Sample rate of `samples` */
  readonly sampleRate: number;
  /** Duration of `samples` in seconds */
  readonly durationSeconds: number;
}
