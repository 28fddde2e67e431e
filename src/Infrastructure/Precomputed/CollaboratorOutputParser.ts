/**
 * CollaboratorOutputParser.ts
 *
 * Reads and shape-checks collaborator output saved as JSON.
 *
 * Diarization: `{ "segments": [{ "speakerId", "startTime", "endTime" }] }`
 * or a bare array of segments.
 *
 * Transcription: `{ "text", "confidence", "tokenTimings": [{ "token",
 * "startTime", "endTime", "confidence" }] | null }`; a missing
 * `tokenTimings` is read as null.
 */

import { readFile } from 'node:fs/promises';
import type {
  SpeakerDiarizationResult,
  SpeakerInterval,
} from '../../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type {
  STTTranscriptionResult,
  TokenTiming,
} from '../../Core/Models/STT/STTTranscriptionResult';
import { InputError } from '../../Foundation/ErrorTypes/InputError';
import { getSystemErrorCode } from '../../Foundation/ErrorTypes/ErrorCategory';
import { toError } from '../../Foundation/ErrorTypes/SDKError';

type JsonRecord = Record<string, unknown>;

/**
 * Thrown by the shape checks; converted to an InputError carrying the path.
 */
class ShapeError extends Error {}

export async function readDiarizationFile(path: string): Promise<SpeakerDiarizationResult> {
  return parseDiarizationOutput(await readJsonFile(path), path);
}

export async function readTranscriptionFile(path: string): Promise<STTTranscriptionResult> {
  return parseTranscriptionOutput(await readJsonFile(path), path);
}

export function parseDiarizationOutput(value: unknown, path: string): SpeakerDiarizationResult {
  return withPath(path, () => {
    const list = Array.isArray(value) ? value : requireArray(requireRecord(value, 'root'), 'segments');
    return {
      segments: list.map((entry, index) => parseInterval(entry, `segments[${index}]`)),
    };
  });
}

export function parseTranscriptionOutput(value: unknown, path: string): STTTranscriptionResult {
  return withPath(path, () => {
    const record = requireRecord(value, 'root');
    const rawTimings = record['tokenTimings'];
    const tokenTimings =
      rawTimings === undefined || rawTimings === null
        ? null
        : requireArray(record, 'tokenTimings').map((entry, index) =>
            parseToken(entry, `tokenTimings[${index}]`)
          );

    return {
      text: requireString(record, 'text', 'root'),
      confidence: requireNumber(record, 'confidence', 'root'),
      tokenTimings,
    };
  });
}

async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const cause = toError(error);
    throw getSystemErrorCode(cause) === 'ENOENT'
      ? InputError.fileNotFound(path, cause)
      : InputError.unreadable(path, cause);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw InputError.malformedCollaboratorOutput(path, 'invalid JSON', toError(error));
  }
}

function parseInterval(value: unknown, where: string): SpeakerInterval {
  const record = requireRecord(value, where);
  return {
    speakerId: requireString(record, 'speakerId', where),
    startTime: requireNumber(record, 'startTime', where),
    endTime: requireNumber(record, 'endTime', where),
  };
}

function parseToken(value: unknown, where: string): TokenTiming {
  const record = requireRecord(value, where);
  return {
    token: requireString(record, 'token', where),
    startTime: requireNumber(record, 'startTime', where),
    endTime: requireNumber(record, 'endTime', where),
    confidence: requireNumber(record, 'confidence', where),
  };
}

function withPath<T>(path: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ShapeError) {
      throw InputError.malformedCollaboratorOutput(path, error.message);
    }
    throw error;
  }
}

function requireRecord(value: unknown, where: string): JsonRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ShapeError(`${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function requireArray(record: JsonRecord, key: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new ShapeError(`'${key}' must be an array`);
  }
  return value;
}

function requireString(record: JsonRecord, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ShapeError(`${where}.${key} must be a string`);
  }
  return value;
}

function requireNumber(record: JsonRecord, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== 'number') {
    throw new ShapeError(`${where}.${key} must be a number`);
  }
  return value;
}
