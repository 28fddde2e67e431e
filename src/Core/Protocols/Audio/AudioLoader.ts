/**
 * AudioLoader.ts
 *
 * Protocol for decoding an audio file into mono PCM at TARGET_SAMPLE_RATE.
 */

import type { LoadedAudio } from '../../Models/Audio/LoadedAudio';

export interface AudioLoader {
  /**
   * Decode the file at `path`.
   * Rejects with an InputError when the file is missing or malformed.
   */
  load(path: string): Promise<LoadedAudio>;
}
