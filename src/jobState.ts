import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { ConversionError, type ConversionErrorKind } from './errors.js';
import type { ConversionJob, JobStatus } from './types.js';

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['running', 'cancelled', 'failed'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export const isTerminal = (status: JobStatus): boolean => TERMINAL_STATUSES.includes(status);

export const canTransition = (from: JobStatus, to: JobStatus): boolean => TRANSITIONS[from].includes(to);

export const isRetryable = (job: ConversionJob): boolean => job.status === 'failed' || job.status === 'cancelled';

/**
 * Fields a transition may carry along. Status, id and input path are not among them.
 */
export type JobUpdate = Partial<
  Pick<ConversionJob, 'coverImagePath' | 'outputPath' | 'progress' | 'durationMs' | 'logTail'>
> & {
  readonly errorMessage?: string;
  readonly errorKind?: ConversionErrorKind;
};

/**
 * Creates a queued job for an audio file.
 */
export const createJob = (inputAudioPath: string, id: string = randomUUID()): ConversionJob => {
  const now = new Date();
  return {
    id,
    inputAudioPath: path.resolve(inputAudioPath),
    status: 'queued',
    progress: 0,
    logTail: [],
    createdAt: now,
    updatedAt: now,
  };
};

/**
 * Returns the job moved to `to`, or throws `InvalidTransition`. Error fields survive
 * only on a move into `failed`.
 */
export const transitionJob = (job: ConversionJob, to: JobStatus, update: JobUpdate = {}): ConversionJob => {
  if (!canTransition(job.status, to)) {
    throw new ConversionError('InvalidTransition', `Job ${job.id} cannot move from ${job.status} to ${to}`);
  }
  const { errorMessage, errorKind, ...rest } = update;
  const next: ConversionJob = {
    ...job,
    ...rest,
    status: to,
    errorMessage: to === 'failed' ? errorMessage ?? 'Conversion failed' : undefined,
    errorKind: to === 'failed' ? errorKind : undefined,
    updatedAt: new Date(),
  };
  return next;
};

/**
 * Updates non-status fields of a job, e.g. progress while it runs.
 */
export const patchJob = (
  job: ConversionJob,
  update: Partial<Pick<ConversionJob, 'progress' | 'durationMs' | 'outputPath' | 'logTail'>>,
): ConversionJob => ({ ...job, ...update, updatedAt: new Date() });

/**
 * A retry is a new lifecycle: fresh id, progress and error, same audio input. The old
 * record is left as it was.
 */
export const createRetryJob = (job: ConversionJob, id: string = randomUUID()): ConversionJob => {
  if (!isRetryable(job)) {
    throw new ConversionError('InvalidRetry', `Job ${job.id} is ${job.status}; only failed or cancelled jobs can be retried`);
  }
  return { ...createJob(job.inputAudioPath, id), retryOf: job.id };
};
