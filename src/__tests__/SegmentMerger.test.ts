/**
 * Tests for the segment merger
 */

import { expect } from '@jest/globals';
import {
  mergeSegments,
  mergeSpeakerAndTranscript,
} from '../Features/SegmentMerge/SegmentMerger';
import { ErrorCode } from '../Foundation/ErrorTypes/ErrorCodes';
import { ValidationError } from '../Foundation/ErrorTypes/ValidationError';
import { interval, token } from './fixtures';

const withWords = { includeWordTimings: true, utteranceConfidence: 0.8 };
const withoutWords = { includeWordTimings: false, utteranceConfidence: 0.8 };

describe('SegmentMerger', () => {
  describe('mergeSegments', () => {
    it('should split a two-speaker conversation at the speaker change', () => {
      const segments = mergeSegments(
        [interval('A', 0, 5), interval('B', 5, 10)],
        [token('Hi', 0, 0.5), token(' there', 0.5, 1), token(' bye', 5.2, 5.6)],
        withoutWords
      );

      expect(segments).toEqual([
        { speaker: 'A', text: 'Hi there', startTime: 0, endTime: 1, words: null, confidence: 0.8 },
        { speaker: 'B', text: 'bye', startTime: 5.2, endTime: 5.6, words: null, confidence: 0.8 },
      ]);
    });

    it('should attach one word timing per constituent token', () => {
      const segments = mergeSegments(
        [interval('A', 0, 5)],
        [token('Hi', 0, 0.5, 0.9), token(' there', 0.5, 1, 0.7)],
        withWords
      );

      expect(segments).toHaveLength(1);
      expect(segments[0]?.words).toEqual([
        { word: 'Hi', startTime: 0, endTime: 0.5, confidence: 0.9 },
        { word: ' there', startTime: 0.5, endTime: 1, confidence: 0.7 },
      ]);
    });

    it('should use the utterance confidence rather than token confidences', () => {
      const segments = mergeSegments(
        [interval('A', 0, 5)],
        [token('a', 0, 1, 0.1), token('b', 1, 2, 0.2)],
        { includeWordTimings: false, utteranceConfidence: 0.65 }
      );

      expect(segments[0]?.confidence).toBe(0.65);
    });

    it('should attribute a token by its midpoint', () => {
      // Starts in A, midpoint 5.5 lies in B
      const segments = mergeSegments(
        [interval('A', 0, 5), interval('B', 5.1, 10)],
        [token(' over', 4.5, 6.5)],
        withoutWords
      );

      expect(segments.map((segment) => segment.speaker)).toEqual(['B']);
    });

    it('should drop tokens whose midpoint lies in a gap', () => {
      const segments = mergeSegments(
        [interval('A', 0, 1), interval('B', 3, 4)],
        [token('x', 0, 1), token(' lost', 1.5, 2.5), token('z', 3, 4)],
        withWords
      );

      expect(segments).toEqual([
        {
          speaker: 'A',
          text: 'x',
          startTime: 0,
          endTime: 1,
          words: [{ word: 'x', startTime: 0, endTime: 1, confidence: 0.9 }],
          confidence: 0.8,
        },
        {
          speaker: 'B',
          text: 'z',
          startTime: 3,
          endTime: 4,
          words: [{ word: 'z', startTime: 3, endTime: 4, confidence: 0.9 }],
          confidence: 0.8,
        },
      ]);
    });

    it('should drop every token after the last interval', () => {
      const segments = mergeSegments(
        [interval('A', 0, 1)],
        [token('kept', 0, 0.5), token(' late', 2, 3), token(' later', 4, 5)],
        withoutWords
      );

      expect(segments).toEqual([
        { speaker: 'A', text: 'kept', startTime: 0, endTime: 0.5, words: null, confidence: 0.8 },
      ]);
    });

    it('should drop tokens before the first interval', () => {
      const segments = mergeSegments(
        [interval('A', 2, 3)],
        [token('early', 0, 1), token('on', 2, 3)],
        withoutWords
      );

      expect(segments.map((segment) => segment.text)).toEqual(['on']);
    });

    it('should not fragment a run across a silent gap', () => {
      const segments = mergeSegments(
        [interval('A', 0, 1), interval('A', 3, 4)],
        [token('one', 0, 1), token(' um', 1.5, 2.5), token(' two', 3, 4)],
        withWords
      );

      expect(segments).toHaveLength(1);
      expect(segments[0]).toMatchObject({ speaker: 'A', text: 'one two', startTime: 0, endTime: 4 });
      expect(segments[0]?.words?.map((word) => word.word)).toEqual(['one', ' two']);
    });

    it('should start a new segment each time the speaker changes', () => {
      const segments = mergeSegments(
        [interval('A', 0, 1), interval('B', 1, 2), interval('A', 2, 3)],
        [token('a', 0, 0.5), token('b', 1.2, 1.6), token('c', 2.2, 2.6)],
        withoutWords
      );

      expect(segments.map((segment) => [segment.speaker, segment.text])).toEqual([
        ['A', 'a'],
        ['B', 'b'],
        ['A', 'c'],
      ]);
    });

    it('should give an overlapped token to the interval at the cursor', () => {
      const segments = mergeSegments(
        [interval('A', 0, 5), interval('B', 4, 8)],
        [token('shared', 4.4, 4.6), token(' next', 6, 6.2)],
        withoutWords
      );

      expect(segments.map((segment) => [segment.speaker, segment.text])).toEqual([
        ['A', 'shared'],
        ['B', 'next'],
      ]);
    });

    it('should suppress runs with no text', () => {
      const segments = mergeSegments(
        [interval('A', 0, 1), interval('B', 1, 2)],
        [token('', 0, 0.5), token('hello', 1.2, 1.8)],
        withoutWords
      );

      expect(segments).toEqual([
        { speaker: 'B', text: 'hello', startTime: 1.2, endTime: 1.8, words: null, confidence: 0.8 },
      ]);
    });

    it('should emit segments in start time order', () => {
      const segments = mergeSegments(
        [interval('A', 0, 2), interval('B', 2, 4), interval('C', 4, 6)],
        [token('a', 0, 1), token('b', 2, 3), token('c', 4, 5), token('d', 5, 6)],
        withoutWords
      );
      const starts = segments.map((segment) => segment.startTime);

      expect(starts).toEqual([0, 2, 4]);
    });

    it('should fall back to one empty segment per interval without tokens', () => {
      const segments = mergeSegments(
        [interval('A', 0, 2), interval('B', 2.5, 4)],
        [],
        withWords
      );

      expect(segments).toEqual([
        { speaker: 'A', text: '', startTime: 0, endTime: 2, words: null, confidence: 0.8 },
        { speaker: 'B', text: '', startTime: 2.5, endTime: 4, words: null, confidence: 0.8 },
      ]);
    });

    it('should return nothing without intervals', () => {
      expect(mergeSegments([], [token('hi', 0, 1)], withoutWords)).toEqual([]);
      expect(mergeSegments([], [], withoutWords)).toEqual([]);
    });

    it('should produce the same segmentation with and without word timings', () => {
      const intervals = [interval('A', 0, 5), interval('B', 5, 10)];
      const tokens = [token('Hi', 0, 0.5), token(' there', 0.5, 1), token(' bye', 5.2, 5.6)];

      const strip = (segments: ReturnType<typeof mergeSegments>) =>
        segments.map(({ speaker, text, startTime, endTime }) => ({ speaker, text, startTime, endTime }));
      const detailed = mergeSegments(intervals, tokens, withWords);
      const plain = mergeSegments(intervals, tokens, withoutWords);

      expect(strip(detailed)).toEqual(strip(plain));
      expect(detailed.every((segment) => segment.words !== null)).toBe(true);
      expect(plain.every((segment) => segment.words === null)).toBe(true);
    });

    it('should reject unsorted intervals', () => {
      const merge = () =>
        mergeSegments([interval('B', 5, 6), interval('A', 0, 1)], [token('x', 0, 1)], withoutWords);

      expect(merge).toThrow(ValidationError);
      expect(merge).toThrow('Invalid merge input: interval[1] starts at 0, before interval[0] at 5');
    });

    it('should reject a token with a negative duration', () => {
      try {
        mergeSegments([interval('A', 0, 5)], [token('x', 2, 1)], withoutWords);
        throw new Error('expected a ValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.code).toBe(ErrorCode.ValidationFailed);
          expect(error.issues).toEqual(['token[0] ends before it starts (2 > 1)']);
        }
      }
    });

    it('should skip the precondition check when asked to', () => {
      const segments = mergeSegments(
        [interval('B', 5, 6), interval('A', 0, 1)],
        [token('x', 5, 6)],
        { ...withoutWords, validateInput: false }
      );

      expect(segments.map((segment) => segment.speaker)).toEqual(['B']);
    });
  });

  describe('mergeSpeakerAndTranscript', () => {
    it('should merge collaborator results', () => {
      const segments = mergeSpeakerAndTranscript(
        { segments: [interval('Speaker_01', 0, 5), interval('Speaker_02', 5, 10)] },
        {
          text: 'Hi there bye',
          confidence: 0.92,
          tokenTimings: [token('Hi', 0, 0.5), token(' there', 0.5, 1), token(' bye', 5.2, 5.6)],
        },
        false
      );

      expect(segments).toEqual([
        { speaker: 'Speaker_01', text: 'Hi there', startTime: 0, endTime: 1, words: null, confidence: 0.92 },
        { speaker: 'Speaker_02', text: 'bye', startTime: 5.2, endTime: 5.6, words: null, confidence: 0.92 },
      ]);
    });

    it('should take the fallback path when token timings are missing', () => {
      const segments = mergeSpeakerAndTranscript(
        { segments: [interval('Speaker_01', 0, 3)] },
        { text: 'hello', confidence: 0.5, tokenTimings: null },
        true
      );

      expect(segments).toEqual([
        { speaker: 'Speaker_01', text: '', startTime: 0, endTime: 3, words: null, confidence: 0.5 },
      ]);
    });
  });
});
