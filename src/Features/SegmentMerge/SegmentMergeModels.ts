/**
 * SegmentMergeModels.ts
 *
 * Output records of the segment merger.
 */

/**
 * Timing of one constituent token of a segment
 */
export interface WordTiming {
  readonly word: string;
  readonly startTime: number; // seconds
  readonly endTime: number; // seconds
  readonly confidence: number;
}

/**
 * One contiguous run of tokens attributed to one speaker
 */
export interface TranscriptSegment {
  readonly speaker: string;
  /** Concatenated token text, trimmed */
  readonly text: string;
  /** Start of the first token (interval start in the no-timing fallback) */
  readonly startTime: number;
  /** End of the last token (interval end in the no-timing fallback) */
  readonly endTime: number;
  /** Null unless word timings were requested */
  readonly words: readonly WordTiming[] | null;
  /** Utterance-level ASR confidence, shared by every segment of a merge */
  readonly confidence: number;
}

export interface MergeOptions {
  readonly includeWordTimings: boolean;
  readonly utteranceConfidence: number;
  /** Run the precondition check before merging (default: true) */
  readonly validateInput?: boolean;
}
