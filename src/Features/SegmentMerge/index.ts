/**
 * Segment merge feature
 */

export { mergeSegments, mergeSpeakerAndTranscript } from './SegmentMerger';
export { matchInterval, tokenMidpoint, type IntervalMatch } from './IntervalMatcher';
export {
  SegmentAccumulator,
  trimHorizontalWhitespace,
  type AccumulatorOptions,
} from './SegmentAccumulator';
export { validateMergeInput, collectMergeInputIssues } from './MergeInputValidator';
export type { MergeOptions, TranscriptSegment, WordTiming } from './SegmentMergeModels';
