/**
 * MergeInputValidator.ts
 *
 * Precondition check for the merger. The merge pass depends on both inputs
 * being sorted by startTime and on well-formed time ranges.
 */

import type { SpeakerInterval } from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type { TokenTiming } from '../../Core/Models/STT/STTTranscriptionResult';
import { ValidationError } from '../../Foundation/ErrorTypes/ValidationError';

interface TimedRange {
  readonly startTime: number;
  readonly endTime: number;
}

export function collectMergeInputIssues(
  intervals: readonly SpeakerInterval[],
  tokens: readonly TokenTiming[],
  utteranceConfidence: number
): string[] {
  const issues: string[] = [];

  intervals.forEach((interval, index) => {
    if (interval.speakerId.length === 0) {
      issues.push(`interval[${index}] has an empty speakerId`);
    }
  });
  issues.push(...collectRangeIssues('interval', intervals));

  issues.push(...collectRangeIssues('token', tokens));
  tokens.forEach((token, index) => {
    if (!isUnitInterval(token.confidence)) {
      issues.push(`token[${index}] confidence ${token.confidence} is outside [0, 1]`);
    }
  });

  if (!isUnitInterval(utteranceConfidence)) {
    issues.push(`utterance confidence ${utteranceConfidence} is outside [0, 1]`);
  }

  return issues;
}

/**
 * @returns a ValidationError listing every issue, or null for well-formed input
 */
export function validateMergeInput(
  intervals: readonly SpeakerInterval[],
  tokens: readonly TokenTiming[],
  utteranceConfidence: number
): ValidationError | null {
  const issues = collectMergeInputIssues(intervals, tokens, utteranceConfidence);
  return issues.length > 0 ? ValidationError.mergeInput(issues) : null;
}

function collectRangeIssues(label: string, ranges: readonly TimedRange[]): string[] {
  const issues: string[] = [];
  let previous: { index: number; startTime: number } | null = null;

  for (const [index, range] of ranges.entries()) {
    if (!Number.isFinite(range.startTime) || !Number.isFinite(range.endTime)) {
      issues.push(`${label}[${index}] has a non-finite time`);
      continue;
    }
    if (range.endTime < range.startTime) {
      issues.push(
        `${label}[${index}] ends before it starts (${range.startTime} > ${range.endTime})`
      );
    }
    if (previous !== null && range.startTime < previous.startTime) {
      issues.push(
        `${label}[${index}] starts at ${range.startTime}, before ${label}[${previous.index}] at ${previous.startTime}`
      );
    }
    previous = { index, startTime: range.startTime };
  }

  return issues;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}
