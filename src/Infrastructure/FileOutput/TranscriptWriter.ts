/**
 * TranscriptWriter.ts
 *
 * Writes a transcript as key-sorted JSON.
 */

import { writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { DiarizedTranscript } from '../../Features/DiarizedTranscription/DiarizedTranscriptModels';
import { IOError } from '../../Foundation/ErrorTypes/IOError';
import { toError } from '../../Foundation/ErrorTypes/SDKError';
import { serializeTranscript } from '../Serialization/TranscriptSerializer';

export class TranscriptWriter {
  private readonly homeDirectory: string;

  constructor(homeDirectory: string = homedir()) {
    this.homeDirectory = homeDirectory;
  }

  /**
   * @returns the path written, with `~` expanded
   * @throws IOError when the file cannot be written
   */
  async write(transcript: DiarizedTranscript, path: string): Promise<string> {
    const resolvedPath = expandHomeDirectory(path, this.homeDirectory);
    try {
      await writeFile(resolvedPath, serializeTranscript(transcript), 'utf8');
    } catch (error) {
      throw IOError.writeFailed(resolvedPath, toError(error));
    }
    return resolvedPath;
  }
}

export function expandHomeDirectory(path: string, homeDirectory: string = homedir()): string {
  if (path === '~') {
    return homeDirectory;
  }
  if (path.startsWith('~/')) {
    return join(homeDirectory, path.slice(2));
  }
  return path;
}
