import { EventEmitter } from 'node:events';
import path from 'node:path';
import fs from 'fs-extra';
import pLimit, { type LimitFunction } from 'p-limit';
import { DEFAULT_CONCURRENCY, DEFAULT_LOG_TAIL_LINES } from './config.js';
import { makeDebug } from './debug.js';
import { DurationResolver, type DurationLookup } from './duration.js';
import { FfmpegEncoder, type EncodeOutcome, type Encoder } from './encoder.js';
import { ConversionError, isQueueFatal, toConversionError } from './errors.js';
import { createJob, createRetryJob, isTerminal, patchJob, transitionJob, type JobUpdate } from './jobState.js';
import { createOutputPathResolver, outputBaseName, type OutputPathResolver } from './outputPath.js';
import { createJobQueue, type ClearResult } from './queue.js';
import { ensureOutputDir, untilAborted } from './utils.js';
import {
  INDETERMINATE,
  type ControllerEventMap,
  type ControllerEventName,
  type ConversionJob,
  type JobProgress,
  type JobStatus,
  type ProgressSnapshot,
} from './types.js';

export interface ConversionControllerOptions {
  readonly outputDir: string;
  readonly coverImagePath?: string;
  readonly concurrency?: number;
  readonly encoder?: Encoder;
  readonly durations?: DurationLookup;
  readonly outputPaths?: OutputPathResolver;
  /** Only used when no encoder is supplied. */
  readonly logTailLines?: number;
}

const debug = makeDebug('controller');

const nextProgress = (current: JobProgress, reported: JobProgress): JobProgress =>
  typeof current === 'number' && typeof reported === 'number' ? Math.max(current, reported) : reported;

/**
 * Drives queued jobs through probing, naming and encoding on a bounded pool of slots.
 * Control calls return immediately; results arrive as events.
 */
export class ConversionController {
  readonly concurrency: number;

  private readonly emitter = new EventEmitter();
  private readonly queue = createJobQueue();
  private readonly limit: LimitFunction;
  private readonly encoder: Encoder;
  private readonly durations: DurationLookup;
  private readonly outputPaths: OutputPathResolver;
  private readonly aborts = new Map<string, AbortController>();
  private readonly reservations = new Map<string, string>();
  private idleWaiters: Array<() => void> = [];
  private coverImagePath?: string;
  private outputDir: string;
  private scheduled = 0;
  private halt?: ConversionError;

  constructor(options: ConversionControllerOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.limit = pLimit(concurrency);
    this.encoder = options.encoder ?? new FfmpegEncoder({ logTailLines: options.logTailLines ?? DEFAULT_LOG_TAIL_LINES });
    this.durations = options.durations ?? new DurationResolver();
    this.outputPaths = options.outputPaths ?? createOutputPathResolver();
    this.outputDir = path.resolve(options.outputDir);
    if (options.coverImagePath) {
      this.setCoverImage(options.coverImagePath);
    }
  }

  /**
   * Subscribes to a controller event and returns the matching unsubscribe function.
   */
  on<K extends ControllerEventName>(event: K, listener: (payload: ControllerEventMap[K]) => void): () => void {
    // A throwing listener must not abort the job pipeline that emitted the event.
    const isolated = (payload: ControllerEventMap[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        debug('%s listener threw: %s', event, message);
      }
    };
    this.emitter.on(event, isolated);
    return () => {
      this.emitter.off(event, isolated);
    };
  }

  setCoverImage(coverImagePath: string): void {
    this.coverImagePath = path.resolve(coverImagePath);
    debug('cover image set to %s', this.coverImagePath);
  }

  getCoverImage(): string | undefined {
    return this.coverImagePath;
  }

  setOutputDir(outputDir: string): void {
    this.outputDir = path.resolve(outputDir);
    debug('output directory set to %s', this.outputDir);
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  addAudioFiles(audioPaths: readonly string[]): ConversionJob[] {
    const jobs = audioPaths.map((audioPath) => this.queue.append(createJob(audioPath)));
    for (const job of jobs) {
      this.emit('submitted', { job });
      if (this.isRunning()) {
        this.schedule();
      }
    }
    return jobs;
  }

  isRunning(): boolean {
    return this.scheduled > 0;
  }

  start(): void {
    if (this.isRunning()) {
      return;
    }
    if (this.queue.size === 0) {
      throw new ConversionError('EmptyAudioList', 'Add at least one audio file before starting');
    }
    if (!this.coverImagePath) {
      throw new ConversionError('MissingCoverImage', 'Select a cover image before starting');
    }
    const queued = this.queue.countByStatus('queued');
    if (queued === 0) {
      return;
    }
    this.halt = undefined;
    debug('starting %d job(s) with concurrency %d', queued, this.concurrency);
    for (let i = 0; i < queued; i += 1) {
      this.schedule();
    }
  }

  /**
   * Queued jobs are cancelled on the spot; running ones are signalled and settle once
   * the encoder has stopped. Terminal jobs are left alone.
   */
  cancel(jobId: string): void {
    const job = this.queue.require(jobId);
    if (job.status === 'queued') {
      this.transition(job, 'cancelled');
      return;
    }
    if (job.status === 'running') {
      debug('cancelling running job %s', jobId);
      this.aborts.get(jobId)?.abort();
    }
  }

  cancelAll(): void {
    for (const job of this.queue.list()) {
      if (!isTerminal(job.status)) {
        this.cancel(job.id);
      }
    }
  }

  retry(jobId: string): ConversionJob {
    const retried = this.queue.append(createRetryJob(this.queue.require(jobId)));
    this.emit('submitted', { job: retried });
    if (this.isRunning()) {
      this.schedule();
    }
    return retried;
  }

  remove(jobId: string): ConversionJob {
    return this.queue.remove(jobId);
  }

  clearAll(): ClearResult {
    return this.queue.clear();
  }

  getJob(jobId: string): ConversionJob | undefined {
    return this.queue.get(jobId);
  }

  listJobs(): readonly ConversionJob[] {
    return this.queue.list();
  }

  /**
   * Resolves once every scheduled slot has finished.
   */
  whenIdle(): Promise<void> {
    if (!this.isRunning()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private emit<K extends ControllerEventName>(event: K, payload: ControllerEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  private schedule(): void {
    this.scheduled += 1;
    void this.limit(() => this.runNext())
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        debug('slot ended with an error: %s', message);
      })
      .finally(() => this.releaseSlot());
  }

  private releaseSlot(): void {
    this.scheduled -= 1;
    if (this.scheduled > 0) {
      return;
    }
    const jobs = this.queue.list();
    const count = (status: JobStatus): number => jobs.filter((job) => job.status === status).length;
    debug('queue drained');
    this.emit('drained', {
      completed: count('completed'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      jobs,
    });
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private commit(job: ConversionJob): ConversionJob {
    return this.queue.update(job);
  }

  private transition(job: ConversionJob, to: JobStatus, update?: JobUpdate): ConversionJob {
    const next = this.commit(transitionJob(job, to, update));
    this.emit('status', { job: next, status: next.status, errorMessage: next.errorMessage });
    return next;
  }

  private async runNext(): Promise<void> {
    const next = this.queue.nextQueued();
    if (!next) {
      return;
    }
    if (this.halt) {
      this.transition(next, 'failed', { errorMessage: this.halt.message, errorKind: this.halt.kind });
      return;
    }
    const coverImagePath = this.coverImagePath;
    if (!coverImagePath) {
      this.transition(next, 'failed', { errorMessage: 'No cover image selected', errorKind: 'MissingCoverImage' });
      return;
    }

    const abort = new AbortController();
    this.aborts.set(next.id, abort);
    const job = this.transition(next, 'running', { coverImagePath, progress: 0 });
    debug('job %s running: audio=%s cover=%s', job.id, job.inputAudioPath, coverImagePath);

    try {
      const outcome = await this.execute(job.id, coverImagePath, abort.signal);
      this.finalize(job.id, outcome);
    } catch (error) {
      const failure = toConversionError(error, 'Unexpected');
      const current = this.queue.get(job.id);
      if (current?.status === 'running') {
        this.failJob(current, failure, []);
      } else {
        debug('job %s already %s, dropping error: %s', job.id, current?.status ?? 'removed', failure.message);
      }
    } finally {
      this.aborts.delete(job.id);
      const reserved = this.reservations.get(job.id);
      if (reserved) {
        this.outputPaths.release(reserved);
        this.reservations.delete(job.id);
      }
    }
  }

  private async execute(jobId: string, coverImagePath: string, signal: AbortSignal): Promise<EncodeOutcome> {
    const cancelled: EncodeOutcome = { status: 'cancelled', logTail: [] };
    const outputDir = await untilAborted(ensureOutputDir(this.outputDir), signal);
    let job = this.queue.require(jobId);
    if (outputDir === undefined) {
      return cancelled;
    }

    const inputs = await untilAborted(
      Promise.all([fs.pathExists(job.inputAudioPath), fs.pathExists(coverImagePath)]),
      signal,
    );
    if (inputs === undefined || signal.aborted) {
      return cancelled;
    }
    const [audioExists, coverExists] = inputs;
    if (!audioExists) {
      throw new ConversionError('InputMissing', `Audio file not found: ${job.inputAudioPath}`);
    }
    if (!coverExists) {
      throw new ConversionError('InputMissing', `Cover image not found: ${coverImagePath}`);
    }

    const duration = await untilAborted(this.durations.resolve(job.inputAudioPath, signal), signal);
    if (duration === undefined || signal.aborted) {
      return cancelled;
    }
    const { durationMs, source } = duration;
    debug('job %s duration %s (%s)', jobId, durationMs ?? 'unknown', source);
    job = this.commit(
      patchJob(this.queue.require(jobId), { durationMs, progress: durationMs === undefined ? INDETERMINATE : 0 }),
    );
    if (durationMs === undefined) {
      this.emit('progress', { jobId, progress: INDETERMINATE });
    }
    if (signal.aborted) {
      return cancelled;
    }

    const outputPath = await this.outputPaths.reserve(outputDir, outputBaseName(job.inputAudioPath));
    this.reservations.set(jobId, outputPath);
    this.commit(patchJob(this.queue.require(jobId), { outputPath }));
    if (signal.aborted) {
      return cancelled;
    }

    return this.encoder.encode({
      jobId,
      coverImagePath,
      audioPath: job.inputAudioPath,
      outputPath,
      durationMs,
      signal,
      onProgress: (snapshot) => this.reportProgress(jobId, snapshot),
      onLog: (line) => this.emit('log', { jobId, line }),
    });
  }

  private reportProgress(jobId: string, snapshot: ProgressSnapshot): void {
    const job = this.queue.get(jobId);
    if (!job || job.status !== 'running') {
      return;
    }
    const progress = nextProgress(job.progress, snapshot.progress);
    if (progress !== job.progress) {
      this.commit(patchJob(job, { progress }));
    }
    this.emit('progress', { jobId, progress, snapshot });
  }

  private finalize(jobId: string, outcome: EncodeOutcome): void {
    const job = this.queue.require(jobId);
    switch (outcome.status) {
      case 'success':
        this.transition(job, 'completed', { progress: 1, outputPath: outcome.outputPath, logTail: outcome.logTail });
        break;
      case 'cancelled':
        this.transition(job, 'cancelled', { logTail: outcome.logTail });
        break;
      case 'failure':
        this.failJob(job, outcome.error, outcome.logTail);
        break;
    }
  }

  private failJob(job: ConversionJob, error: ConversionError, logTail: readonly string[]): void {
    debug('job %s failed (%s): %s', job.id, error.kind, error.message);
    this.transition(job, 'failed', { errorMessage: error.message, errorKind: error.kind, logTail });
    if (!isQueueFatal(error)) {
      return;
    }
    this.halt = error;
    for (const queued of this.queue.list()) {
      if (queued.status === 'queued') {
        this.transition(queued, 'failed', { errorMessage: error.message, errorKind: error.kind });
      }
    }
  }
}
