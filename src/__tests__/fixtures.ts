/**
 * Shared builders for tests
 */

import type { SpeakerInterval } from '../Core/Models/SpeakerDiarization/SpeakerDiarizationResult';
import type { TokenTiming } from '../Core/Models/STT/STTTranscriptionResult';
import type { DiarizedTranscript } from '../Features/DiarizedTranscription/DiarizedTranscriptModels';

export function interval(speakerId: string, startTime: number, endTime: number): SpeakerInterval {
  return { speakerId, startTime, endTime };
}

export function token(
  text: string,
  startTime: number,
  endTime: number,
  confidence: number = 0.9
): TokenTiming {
  return { token: text, startTime, endTime, confidence };
}

export function sampleTranscript(): DiarizedTranscript {
  return {
    segments: [
      {
        speaker: 'A',
        text: 'Hi',
        startTime: 0,
        endTime: 0.5,
        words: [{ word: 'Hi', startTime: 0, endTime: 0.5, confidence: 0.9 }],
        confidence: 0.8,
      },
      {
        speaker: 'B',
        text: '',
        startTime: 1,
        endTime: 2,
        words: null,
        confidence: 0.8,
      },
    ],
    metadata: {
      audioFile: 'meeting.wav',
      durationSeconds: 2,
      speakerCount: 2,
      speakers: ['A', 'B'],
      processingTime: 0.5,
      diarizationTime: 0.1,
      transcriptionTime: 0.2,
      clusteringThreshold: 0.7,
      modelVersion: 'v3',
    },
  };
}
