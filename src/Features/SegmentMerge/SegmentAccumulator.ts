/**
 * SegmentAccumulator.ts
 *
 * Run state machine of the merger:
 *
 *   idle --token--> open
 *   open --same speaker--> open
 *   open --different speaker--> emit + open(new)
 *   open --finish--> emit + idle
 *
 * A run whose accumulated text is empty is never emitted.
 */

import type { TokenTiming } from '../../Core/Models/STT/STTTranscriptionResult';
import type { TranscriptSegment, WordTiming } from './SegmentMergeModels';

interface OpenRun {
  readonly speaker: string;
  text: string;
  readonly words: WordTiming[];
  readonly startTime: number;
  endTime: number;
}

type RunState =
  | { readonly status: 'idle' }
  | { readonly status: 'open'; readonly run: OpenRun };

export interface AccumulatorOptions {
  readonly includeWordTimings: boolean;
  readonly utteranceConfidence: number;
}

export class SegmentAccumulator {
  private state: RunState = { status: 'idle' };
  private readonly options: AccumulatorOptions;

  constructor(options: AccumulatorOptions) {
    this.options = options;
  }

  /**
   * Speaker of the open run, or null when idle
   */
  get currentSpeaker(): string | null {
    return this.state.status === 'open' ? this.state.run.speaker : null;
  }

  /**
   * Add a token attributed to `speakerId`.
   * Returns the segment completed by a speaker change, if any.
   */
  observe(token: TokenTiming, speakerId: string): TranscriptSegment | null {
    const state = this.state;

    if (state.status === 'open' && state.run.speaker === speakerId) {
      state.run.text += token.token;
      if (this.options.includeWordTimings) {
        state.run.words.push(toWordTiming(token));
      }
      state.run.endTime = token.endTime;
      return null;
    }

    const completed = state.status === 'open' ? this.complete(state.run) : null;
    this.state = {
      status: 'open',
      run: {
        speaker: speakerId,
        text: token.token,
        words: this.options.includeWordTimings ? [toWordTiming(token)] : [],
        startTime: token.startTime,
        endTime: token.endTime,
      },
    };
    return completed;
  }

  /**
   * Close the open run at end of input.
   */
  finish(): TranscriptSegment | null {
    const state = this.state;
    this.state = { status: 'idle' };
    return state.status === 'open' ? this.complete(state.run) : null;
  }

  private complete(run: OpenRun): TranscriptSegment | null {
    if (run.text.length === 0) {
      return null;
    }
    return {
      speaker: run.speaker,
      text: trimHorizontalWhitespace(run.text),
      startTime: run.startTime,
      endTime: run.endTime,
      words: this.options.includeWordTimings ? run.words : null,
      confidence: this.options.utteranceConfidence,
    };
  }
}

/**
 * Strips tabs and space separators at both ends; line breaks are kept.
 */
export function trimHorizontalWhitespace(text: string): string {
  return text.replace(/^[\t\p{Zs}]+|[\t\p{Zs}]+$/gu, '');
}

function toWordTiming(token: TokenTiming): WordTiming {
  return {
    word: token.token,
    startTime: token.startTime,
    endTime: token.endTime,
    confidence: token.confidence,
  };
}
