/**
 * IntervalMatcher.ts
 *
 * Locates the speaker interval containing a timestamp, scanning forward from
 * a cursor. The cursor is returned rather than held, so callers thread it
 * through a pass over time-ordered tokens and it never moves backwards.
 */

import type { SpeakerInterval } from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type { TokenTiming } from '../../Core/Models/STT/STTTranscriptionResult';

export type IntervalMatch =
  /** Timestamp lies inside `interval` (bounds inclusive); cursor points at it */
  | { readonly kind: 'matched'; readonly cursor: number; readonly interval: SpeakerInterval }
  /** Timestamp lies before the interval at the cursor */
  | { readonly kind: 'gap'; readonly cursor: number }
  /** Cursor ran past the last interval */
  | { readonly kind: 'exhausted'; readonly cursor: number };

/**
 * Attribution anchor of a token: the centre of its time range.
 */
export function tokenMidpoint(token: Pick<TokenTiming, 'startTime' | 'endTime'>): number {
  return (token.startTime + token.endTime) / 2;
}

export function matchInterval(
  intervals: readonly SpeakerInterval[],
  cursor: number,
  timestamp: number
): IntervalMatch {
  let index = cursor;

  while (index < intervals.length) {
    const interval = intervals[index];
    if (interval === undefined) {
      break;
    }

    if (timestamp >= interval.startTime && timestamp <= interval.endTime) {
      return { kind: 'matched', cursor: index, interval };
    }
    if (timestamp < interval.startTime) {
      return { kind: 'gap', cursor: index };
    }
    index += 1;
  }

  return { kind: 'exhausted', cursor: index };
}
