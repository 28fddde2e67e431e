/**
 * TranscriptSerializer.ts
 *
 * JSON and plain-text renderings of a DiarizedTranscript.
 *
 * JSON output is pretty-printed with keys sorted at every level, so the same
 * transcript always serializes to the same bytes. A null `words` is omitted.
 */

import type { DiarizedTranscript } from '../../Features/DiarizedTranscription/DiarizedTranscriptModels';
import { formatRealTimeFactor } from '../../Features/DiarizedTranscription/DiarizedTranscriptModels';
import type { TranscriptSegment } from '../../Features/SegmentMerge/SegmentMergeModels';

const RULE = '='.repeat(80);

export function serializeTranscript(transcript: DiarizedTranscript): string {
  const document = {
    segments: transcript.segments.map(segmentToJson),
    metadata: transcript.metadata,
  };
  return JSON.stringify(sortKeys(document), null, 2);
}

/**
 * Human-readable report: one block per segment, then run metadata.
 */
export function formatTranscriptReport(transcript: DiarizedTranscript): string {
  const { segments, metadata } = transcript;
  const lines: string[] = [RULE, 'SPEAKER-DIARIZED TRANSCRIPT', RULE];

  segments.forEach((segment, index) => {
    lines.push(
      '',
      `[${index + 1}] ${segment.speaker} [${segment.startTime.toFixed(2)} - ${segment.endTime.toFixed(2)}]`,
      `    ${segment.text}`
    );
    if (segment.words && segment.words.length > 0) {
      lines.push(`    Words: ${segment.words.length}`);
    }
  });

  lines.push(
    '',
    RULE,
    'METADATA',
    RULE,
    `Duration: ${metadata.durationSeconds.toFixed(2)}s`,
    `Speakers: ${metadata.speakers.join(', ')}`,
    `Total segments: ${segments.length}`,
    `Processing time: ${metadata.processingTime.toFixed(2)}s`,
    `RTFx: ${formatRealTimeFactor(metadata.durationSeconds, metadata.processingTime)}`
  );

  return `${lines.join('\n')}\n`;
}

function segmentToJson(segment: TranscriptSegment): Record<string, unknown> {
  const { words, ...rest } = segment;
  return words === null ? { ...rest } : { ...rest, words };
}

/**
 * Deep copy with object keys in lexicographic order.
 */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, entry]) => [key, sortKeys(entry)]));
  }
  return value;
}
