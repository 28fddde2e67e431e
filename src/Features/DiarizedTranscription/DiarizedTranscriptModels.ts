/**
 * DiarizedTranscriptModels.ts
 *
 * Result of a diarize-transcribe run. Field names are part of the JSON
 * output schema consumed downstream.
 */

import type { TranscriptSegment } from '../SegmentMerge/SegmentMergeModels';
import type { AsrModelVersion } from '../../Core/Protocols/Voice/STTService';

export interface TranscriptMetadata {
  readonly audioFile: string;
  readonly durationSeconds: number;
  readonly speakerCount: number;
  /** Sorted distinct speaker ids */
  readonly speakers: readonly string[];
  /** Wall time of the whole run, seconds */
  readonly processingTime: number;
  readonly diarizationTime: number;
  readonly transcriptionTime: number;
  readonly clusteringThreshold: number;
  readonly modelVersion: AsrModelVersion;
}

export interface DiarizedTranscript {
  readonly segments: readonly TranscriptSegment[];
  readonly metadata: TranscriptMetadata;
}

/**
 * Audio seconds processed per wall-clock second; null when no time elapsed.
 */
export function realTimeFactor(durationSeconds: number, processingTime: number): number | null {
  return processingTime > 0 ? durationSeconds / processingTime : null;
}

export function formatRealTimeFactor(durationSeconds: number, processingTime: number): string {
  const factor = realTimeFactor(durationSeconds, processingTime);
  return factor === null ? 'n/a' : `${factor.toFixed(2)}x`;
}
