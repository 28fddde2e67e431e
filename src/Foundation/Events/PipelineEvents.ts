/**
 * PipelineEvents.ts
 *
 * Typed progress events of the diarized transcription pipeline. Hosts pass
 * their own emitter to the pipeline and subscribe to what they need.
 */

import EventEmitter from 'eventemitter3';
import type { SDKError } from '../ErrorTypes/SDKError';

export type PipelineStage = 'audio' | 'diarization' | 'transcription' | 'merge';

export interface StageStartedEvent {
  readonly stage: PipelineStage;
}

export interface StageCompletedEvent {
  readonly stage: PipelineStage;
  readonly durationMs: number;
  readonly detail: Record<string, unknown>;
}

export interface PipelineCompletedEvent {
  readonly audioFile: string;
  readonly segmentCount: number;
  readonly processingTimeMs: number;
}

export interface PipelineFailedEvent {
  readonly stage: PipelineStage;
  readonly error: SDKError;
}

export interface PipelineEventMap {
  'stage.started': (event: StageStartedEvent) => void;
  'stage.completed': (event: StageCompletedEvent) => void;
  'pipeline.completed': (event: PipelineCompletedEvent) => void;
  'pipeline.failed': (event: PipelineFailedEvent) => void;
}

export class PipelineEventEmitter extends EventEmitter<PipelineEventMap> {}
