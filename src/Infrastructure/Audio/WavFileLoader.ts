/**
 * WavFileLoader.ts
 *
 * Decodes RIFF/WAVE files into mono Float32 PCM at the collaborators'
 * sample rate. Channels are averaged; other sample rates are linearly
 * resampled.
 *
 * Supported encodings: integer PCM (8, 16, 24, 32 bit) and IEEE float (32 bit),
 * including WAVE_FORMAT_EXTENSIBLE headers that wrap either.
 */

import { readFile } from 'node:fs/promises';
import type { AudioLoader } from '../../Core/Protocols/Audio/AudioLoader';
import { type LoadedAudio, TARGET_SAMPLE_RATE } from '../../Core/Models/Audio/LoadedAudio';
import { InputError } from '../../Foundation/ErrorTypes/InputError';
import { getSystemErrorCode } from '../../Foundation/ErrorTypes/ErrorCategory';
import { toError } from '../../Foundation/ErrorTypes/SDKError';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

interface WavFormat {
  readonly audioFormat: number;
  readonly channels: number;
  readonly sampleRate: number;
  readonly bitsPerSample: number;
}

type SampleReader = (view: DataView, offset: number) => number;

export class WavFileLoader implements AudioLoader {
  private readonly targetSampleRate: number;

  constructor(targetSampleRate: number = TARGET_SAMPLE_RATE) {
    this.targetSampleRate = targetSampleRate;
  }

  async load(path: string): Promise<LoadedAudio> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      const cause = toError(error);
      throw getSystemErrorCode(cause) === 'ENOENT'
        ? InputError.fileNotFound(path, cause)
        : InputError.unreadable(path, cause);
    }
    return decodeWav(data, path, this.targetSampleRate);
  }
}

/**
 * Decode an in-memory WAV file. `path` only labels errors.
 */
export function decodeWav(
  data: Uint8Array,
  path: string,
  targetSampleRate: number = TARGET_SAMPLE_RATE
): LoadedAudio {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  if (view.byteLength < 12 || readTag(view, 0) !== 'RIFF' || readTag(view, 8) !== 'WAVE') {
    throw InputError.malformedAudio(path, 'missing RIFF/WAVE header');
  }

  let format: WavFormat | null = null;
  let dataOffset = -1;
  let dataSize = 0;

  // Chunks are word-aligned: odd sizes carry one pad byte
  let offset = 12;
  while (offset + 8 <= view.byteLength) {
    const chunkId = readTag(view, offset);
    const chunkSize = view.getUint32(offset + 4, true);
    const bodyOffset = offset + 8;

    if (chunkId === 'fmt ') {
      format = readFormat(view, bodyOffset, chunkSize, path);
    } else if (chunkId === 'data') {
      dataOffset = bodyOffset;
      dataSize = Math.min(chunkSize, view.byteLength - bodyOffset);
    }
    offset = bodyOffset + chunkSize + (chunkSize % 2);
  }

  if (format === null) {
    throw InputError.malformedAudio(path, "missing 'fmt ' chunk");
  }
  if (dataOffset < 0) {
    throw InputError.malformedAudio(path, "missing 'data' chunk");
  }

  const readSample = sampleReaderFor(format, path);
  const bytesPerSample = format.bitsPerSample / 8;
  const frameSize = bytesPerSample * format.channels;
  const frameCount = Math.floor(dataSize / frameSize);

  const mono = new Float32Array(frameCount);
  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = dataOffset + frame * frameSize;
    let sum = 0;
    for (let channel = 0; channel < format.channels; channel++) {
      sum += readSample(view, frameOffset + channel * bytesPerSample);
    }
    mono[frame] = sum / format.channels;
  }

  const samples = resampleLinear(mono, format.sampleRate, targetSampleRate);
  return {
    samples,
    sampleRate: targetSampleRate,
    durationSeconds: samples.length / targetSampleRate,
  };
}

/**
 * Linear-interpolation resampler.
 */
export function resampleLinear(
  input: Float32Array,
  sourceRate: number,
  targetRate: number
): Float32Array {
  if (sourceRate === targetRate || input.length === 0) {
    return input;
  }

  const outputLength = Math.round((input.length * targetRate) / sourceRate);
  const output = new Float32Array(outputLength);
  const step = sourceRate / targetRate;
  const last = input.length - 1;

  for (let i = 0; i < outputLength; i++) {
    const position = i * step;
    const index = Math.min(Math.floor(position), last);
    const next = Math.min(index + 1, last);
    const fraction = position - index;
    const a = input[index] ?? 0;
    const b = input[next] ?? 0;
    output[i] = a + (b - a) * fraction;
  }
  return output;
}

function readFormat(view: DataView, offset: number, size: number, path: string): WavFormat {
  if (size < 16 || offset + 16 > view.byteLength) {
    throw InputError.malformedAudio(path, "truncated 'fmt ' chunk");
  }

  let audioFormat = view.getUint16(offset, true);
  const channels = view.getUint16(offset + 2, true);
  const sampleRate = view.getUint32(offset + 4, true);
  const bitsPerSample = view.getUint16(offset + 14, true);

  // WAVEFORMATEXTENSIBLE: the sub-format GUID starts with the real format tag
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE && size >= 26 && offset + 26 <= view.byteLength) {
    audioFormat = view.getUint16(offset + 24, true);
  }

  if (channels === 0) {
    throw InputError.malformedAudio(path, 'zero channels');
  }
  if (sampleRate === 0) {
    throw InputError.malformedAudio(path, 'zero sample rate');
  }

  return { audioFormat, channels, sampleRate, bitsPerSample };
}

function sampleReaderFor(format: WavFormat, path: string): SampleReader {
  if (format.audioFormat === WAVE_FORMAT_PCM) {
    switch (format.bitsPerSample) {
      case 8:
        return (view, offset) => (view.getUint8(offset) - 128) / 128;
      case 16:
        return (view, offset) => view.getInt16(offset, true) / 32768;
      case 24:
        return (view, offset) => {
          const value =
            view.getUint8(offset) |
            (view.getUint8(offset + 1) << 8) |
            (view.getInt8(offset + 2) << 16);
          return value / 8388608;
        };
      case 32:
        return (view, offset) => view.getInt32(offset, true) / 2147483648;
    }
  }
  if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT && format.bitsPerSample === 32) {
    return (view, offset) => view.getFloat32(offset, true);
  }
  throw InputError.unsupportedAudioFormat(
    path,
    `format ${format.audioFormat} with ${format.bitsPerSample} bits per sample`
  );
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}
