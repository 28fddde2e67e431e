/**
 * STTTranscriptionResult.ts
 *
 * Output contract of the speech recognition collaborator.
 */

/**
 * One recognized sub-word token. Text carries its own spacing, so
 * concatenating consecutive tokens without a separator rebuilds the words.
 */
export interface TokenTiming {
  readonly token: string;
  readonly startTime: number; // seconds
  readonly endTime: number; // seconds
  readonly confidence: number; // 0.0 to 1.0
}

export interface STTTranscriptionResult {
  /** Full transcript text */
  readonly text: string;
  /** Utterance-level confidence (0.0 to 1.0) */
  readonly confidence: number;
  /** Token timings, null when the engine has no word-level timing */
  readonly tokenTimings: readonly TokenTiming[] | null;
}
