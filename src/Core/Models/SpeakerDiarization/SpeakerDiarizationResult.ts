/**
 * SpeakerDiarizationResult.ts
 *
 * Output contract of the diarization collaborator.
 */

/**
 * One contiguous time range attributed to exactly one speaker.
 * Collections are sorted by startTime; gaps and overlaps are allowed.
 */
export interface SpeakerInterval {
  /** Opaque label, stable across one diarization run (e.g. "Speaker_01") */
  readonly speakerId: string;
  readonly startTime: number; // seconds
  readonly endTime: number; // seconds
}

export interface SpeakerDiarizationResult {
  readonly segments: readonly SpeakerInterval[];
}

/**
 * Sorted distinct speaker ids of a diarization result.
 */
export function distinctSpeakers(segments: readonly SpeakerInterval[]): string[] {
  return Array.from(new Set(segments.map((segment) => segment.speakerId))).sort();
}
