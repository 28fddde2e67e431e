/**
 * SegmentMerger.ts
 *
 * Merges diarization intervals and ASR token timings into speaker-attributed
 * transcript segments.
 *
 * Each token is attributed to the interval containing its midpoint, found
 * with a forward-only cursor, so a merge is linear in tokens + intervals.
 * Tokens whose midpoint falls in a gap, or after the last interval, are
 * dropped without affecting the open run. Consecutive tokens of one speaker
 * form one segment.
 */

import type {
  SpeakerDiarizationResult,
  SpeakerInterval,
} from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type {
  STTTranscriptionResult,
  TokenTiming,
} from '../../Core/Models/STT/STTTranscriptionResult';
import { matchInterval, tokenMidpoint } from './IntervalMatcher';
import { validateMergeInput } from './MergeInputValidator';
import { SegmentAccumulator } from './SegmentAccumulator';
import type { MergeOptions, TranscriptSegment } from './SegmentMergeModels';

/**
 * Merge time-sorted intervals and tokens.
 *
 * With no tokens, returns one empty-text segment per interval so that the
 * speaker activity timeline survives.
 *
 * @throws ValidationError when an input is unsorted or holds malformed ranges
 */
export function mergeSegments(
  intervals: readonly SpeakerInterval[],
  tokens: readonly TokenTiming[],
  options: MergeOptions
): TranscriptSegment[] {
  if (options.validateInput !== false) {
    const error = validateMergeInput(intervals, tokens, options.utteranceConfidence);
    if (error) {
      throw error;
    }
  }

  if (tokens.length === 0) {
    return intervalSegments(intervals, options.utteranceConfidence);
  }

  const accumulator = new SegmentAccumulator(options);
  const segments: TranscriptSegment[] = [];
  let cursor = 0;

  for (const token of tokens) {
    const match = matchInterval(intervals, cursor, tokenMidpoint(token));
    cursor = match.cursor;
    if (match.kind !== 'matched') {
      continue;
    }

    const completed = accumulator.observe(token, match.interval.speakerId);
    if (completed) {
      segments.push(completed);
    }
  }

  const last = accumulator.finish();
  if (last) {
    segments.push(last);
  }

  return segments;
}

/**
 * Merge collaborator results. A transcription without token timings takes
 * the one-segment-per-interval path.
 */
export function mergeSpeakerAndTranscript(
  diarization: SpeakerDiarizationResult,
  transcription: STTTranscriptionResult,
  includeWordTimings: boolean
): TranscriptSegment[] {
  return mergeSegments(diarization.segments, transcription.tokenTimings ?? [], {
    includeWordTimings,
    utteranceConfidence: transcription.confidence,
  });
}

function intervalSegments(
  intervals: readonly SpeakerInterval[],
  confidence: number
): TranscriptSegment[] {
  return intervals.map((interval) => ({
    speaker: interval.speakerId,
    text: '',
    startTime: interval.startTime,
    endTime: interval.endTime,
    words: null,
    confidence,
  }));
}
