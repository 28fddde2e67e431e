/**
 * STTService.ts
 *
 * Protocol for speech-to-text service implementations
 */

import type { STTTranscriptionResult } from '../../Models/STT/STTTranscriptionResult';

/** ASR model generations: v2 is English-only, v3 multilingual. */
export type AsrModelVersion = 'v2' | 'v3';

export interface STTOptions {
  readonly modelVersion: AsrModelVersion;
}

export interface STTService {
  /** Service name, used in logs and errors */
  readonly name: string;

  initialize(options: STTOptions): Promise<void>;

  transcribe(samples: Float32Array, sampleRate: number): Promise<STTTranscriptionResult>;

  readonly isReady: boolean;

  cleanup(): Promise<void>;
}

export function describeModelVersion(version: AsrModelVersion): string {
  return version === 'v2' ? 'v2 (English)' : 'v3 (Multilingual)';
}

/**
 * Accepts `v2`, `2`, `v3`, `3` in any case; null otherwise.
 */
export function parseModelVersion(value: string): AsrModelVersion | null {
  switch (value.trim().toLowerCase()) {
    case 'v2':
    case '2':
      return 'v2';
    case 'v3':
    case '3':
      return 'v3';
    default:
      return null;
  }
}
