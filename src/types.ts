import type { ConversionErrorKind } from './errors.js';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const INDETERMINATE = 'indeterminate';

/**
 * A fraction in [0, 1], or `indeterminate` when the audio duration is unknown.
 */
export type JobProgress = number | typeof INDETERMINATE;

export interface ConversionJob {
  readonly id: string;
  readonly inputAudioPath: string;
  /** Cover captured when the job left the queue; undefined while still queued. */
  readonly coverImagePath?: string;
  readonly outputPath?: string;
  readonly status: JobStatus;
  readonly progress: JobProgress;
  readonly durationMs?: number;
  readonly errorMessage?: string;
  readonly errorKind?: ConversionErrorKind;
  readonly logTail: readonly string[];
  /** Id of the failed or cancelled job this one retries. */
  readonly retryOf?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface ProgressSnapshot {
  readonly elapsedMs: number;
  readonly progress: JobProgress;
  /** True for the frame closed by `progress=end`. */
  readonly final: boolean;
  readonly frame?: number;
  readonly speed?: number;
  readonly totalSizeBytes?: number;
}

export type DurationSource = 'ffprobe' | 'ffmpeg' | 'unknown';

export interface DurationResult {
  readonly durationMs?: number;
  readonly source: DurationSource;
}

export interface JobSubmittedEvent {
  readonly job: ConversionJob;
}

export interface JobStatusEvent {
  readonly job: ConversionJob;
  readonly status: JobStatus;
  readonly errorMessage?: string;
}

export interface JobProgressEvent {
  readonly jobId: string;
  readonly progress: JobProgress;
  readonly snapshot?: ProgressSnapshot;
}

export interface JobLogEvent {
  readonly jobId: string;
  readonly line: string;
}

export interface QueueDrainedEvent {
  readonly completed: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly jobs: readonly ConversionJob[];
}

export interface ControllerEventMap {
  submitted: JobSubmittedEvent;
  status: JobStatusEvent;
  progress: JobProgressEvent;
  log: JobLogEvent;
  drained: QueueDrainedEvent;
}

export type ControllerEventName = keyof ControllerEventMap;
