import { ConversionError } from './errors.js';
import { isTerminal } from './jobState.js';
import type { ConversionJob, JobStatus } from './types.js';

export type ClearResult =
  | { readonly kind: 'all-removed'; readonly removed: number }
  | { readonly kind: 'partial'; readonly removed: number; readonly retained: number };

export interface JobQueue {
  readonly size: number;
  append(job: ConversionJob): ConversionJob;
  get(id: string): ConversionJob | undefined;
  require(id: string): ConversionJob;
  list(): readonly ConversionJob[];
  /** Replaces the stored record with the same id, keeping its position. */
  update(job: ConversionJob): ConversionJob;
  remove(id: string): ConversionJob;
  clear(): ClearResult;
  nextQueued(): ConversionJob | undefined;
  countByStatus(status: JobStatus): number;
  isDrained(): boolean;
}

/**
 * Ordered job list. Insertion order is processing order; running jobs cannot be removed.
 */
export const createJobQueue = (): JobQueue => {
  let jobs: ConversionJob[] = [];

  const get = (id: string): ConversionJob | undefined => jobs.find((job) => job.id === id);

  const requireJob = (id: string): ConversionJob => {
    const job = get(id);
    if (!job) {
      throw new ConversionError('JobNotFound', `No job with id ${id}`);
    }
    return job;
  };

  return {
    get size(): number {
      return jobs.length;
    },
    append(job: ConversionJob): ConversionJob {
      if (job.status !== 'queued') {
        throw new ConversionError('InvalidTransition', `Only queued jobs can be appended, got ${job.status}`);
      }
      if (jobs.some((existing) => existing.id === job.id)) {
        throw new ConversionError('InvalidTransition', `Job ${job.id} is already in the queue`);
      }
      jobs.push(job);
      return job;
    },
    get,
    require: requireJob,
    list: () => [...jobs],
    update(job: ConversionJob): ConversionJob {
      const index = jobs.findIndex((existing) => existing.id === job.id);
      if (index === -1) {
        throw new ConversionError('JobNotFound', `No job with id ${job.id}`);
      }
      jobs[index] = job;
      return job;
    },
    remove(id: string): ConversionJob {
      const job = requireJob(id);
      if (job.status === 'running') {
        throw new ConversionError('JobBusy', `Job ${id} is running and cannot be removed`);
      }
      jobs = jobs.filter((existing) => existing.id !== id);
      return job;
    },
    clear(): ClearResult {
      const retainedJobs = jobs.filter((job) => job.status === 'running');
      const removed = jobs.length - retainedJobs.length;
      jobs = retainedJobs;
      return retainedJobs.length === 0
        ? { kind: 'all-removed', removed }
        : { kind: 'partial', removed, retained: retainedJobs.length };
    },
    nextQueued: () => jobs.find((job) => job.status === 'queued'),
    countByStatus: (status: JobStatus) => jobs.filter((job) => job.status === status).length,
    isDrained: () => jobs.every((job) => isTerminal(job.status)),
  };
};
