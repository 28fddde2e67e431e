/**
 * Tests for replaying collaborator output from JSON files
 */

import { expect } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  parseDiarizationOutput,
  parseTranscriptionOutput,
  readTranscriptionFile,
} from '../Infrastructure/Precomputed/CollaboratorOutputParser';
import {
  PrecomputedDiarizationProvider,
  PrecomputedDiarizationService,
  PrecomputedTranscriptionProvider,
  PrecomputedTranscriptionService,
} from '../Infrastructure/Precomputed/PrecomputedServices';
import { ErrorCode } from '../Foundation/ErrorTypes/ErrorCodes';
import { InputError } from '../Foundation/ErrorTypes/InputError';
import { LoggingManager } from '../Foundation/Logging/Services/LoggingManager';

describe('Precomputed collaborator output', () => {
  beforeAll(() => {
    LoggingManager.shared.removeDestination('console');
  });

  describe('parseDiarizationOutput', () => {
    const segment = { speakerId: 'Speaker_01', startTime: 0, endTime: 1.5 };

    it('should accept a result object', () => {
      expect(parseDiarizationOutput({ segments: [segment] }, 'd.json')).toEqual({
        segments: [segment],
      });
    });

    it('should accept a bare segment array', () => {
      expect(parseDiarizationOutput([segment], 'd.json')).toEqual({ segments: [segment] });
    });

    it('should ignore unknown fields', () => {
      expect(parseDiarizationOutput([{ ...segment, embedding: [0.1] }], 'd.json')).toEqual({
        segments: [segment],
      });
    });

    it('should name the offending field', () => {
      const parse = () => parseDiarizationOutput({ segments: [{ ...segment, speakerId: 1 }] }, 'd.json');

      expect(parse).toThrow(InputError);
      expect(parse).toThrow('Malformed data in d.json: segments[0].speakerId must be a string');
    });

    it('should reject a document without segments', () => {
      expect(() => parseDiarizationOutput({}, 'd.json')).toThrow(
        "Malformed data in d.json: 'segments' must be an array"
      );
    });
  });

  describe('parseTranscriptionOutput', () => {
    it('should read token timings', () => {
      const result = parseTranscriptionOutput(
        {
          text: 'Hi',
          confidence: 0.9,
          tokenTimings: [{ token: 'Hi', startTime: 0, endTime: 0.4, confidence: 0.8 }],
        },
        't.json'
      );

      expect(result).toEqual({
        text: 'Hi',
        confidence: 0.9,
        tokenTimings: [{ token: 'Hi', startTime: 0, endTime: 0.4, confidence: 0.8 }],
      });
    });

    it('should read missing token timings as null', () => {
      expect(parseTranscriptionOutput({ text: '', confidence: 0 }, 't.json').tokenTimings).toBeNull();
      expect(
        parseTranscriptionOutput({ text: '', confidence: 0, tokenTimings: null }, 't.json').tokenTimings
      ).toBeNull();
    });

    it('should reject a root that is not an object', () => {
      expect(() => parseTranscriptionOutput([], 't.json')).toThrow(
        'Malformed data in t.json: root must be an object'
      );
    });
  });

  describe('files', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'precomputed-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should report invalid JSON', async () => {
      const path = join(directory, 'broken.json');
      await writeFile(path, '{ not json');

      await expect(readTranscriptionFile(path)).rejects.toMatchObject({
        code: ErrorCode.MalformedCollaboratorOutput,
        message: `Malformed data in ${path}: invalid JSON`,
      });
    });

    it('should report a missing file', async () => {
      const path = join(directory, 'missing.json');

      await expect(readTranscriptionFile(path)).rejects.toMatchObject({
        code: ErrorCode.FileNotFound,
      });
    });

    it('should replay diarization after initialize', async () => {
      const path = join(directory, 'speakers.json');
      await writeFile(path, JSON.stringify([{ speakerId: 'A', startTime: 0, endTime: 2 }]));
      const service = await new PrecomputedDiarizationProvider(path).createSpeakerDiarizationService();

      expect(service.isReady).toBe(false);
      await service.initialize({ clusteringThreshold: 0.7 });
      expect(service.isReady).toBe(true);
      expect(await service.diarize(new Float32Array(0), 16000)).toEqual({
        segments: [{ speakerId: 'A', startTime: 0, endTime: 2 }],
      });

      await service.cleanup();
      expect(service.isReady).toBe(false);
    });

    it('should replay transcription after initialize', async () => {
      const path = join(directory, 'asr.json');
      await writeFile(path, JSON.stringify({ text: 'ok', confidence: 0.5 }));
      const provider = new PrecomputedTranscriptionProvider(path);
      const service = await provider.createSTTService();

      expect(provider.canHandle('v2')).toBe(true);
      await service.initialize({ modelVersion: 'v3' });
      expect(await service.transcribe(new Float32Array(0), 16000)).toEqual({
        text: 'ok',
        confidence: 0.5,
        tokenTimings: null,
      });
    });

    it('should refuse to run before initialize', async () => {
      await expect(
        new PrecomputedDiarizationService('unused.json').diarize(new Float32Array(0), 16000)
      ).rejects.toMatchObject({ code: ErrorCode.ServiceNotInitialized });
      await expect(
        new PrecomputedTranscriptionService('unused.json').transcribe(new Float32Array(0), 16000)
      ).rejects.toMatchObject({ code: ErrorCode.ServiceNotInitialized });
    });
  });
});
