import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConversionController } from './controller.js';
import type { DurationLookup } from './duration.js';
import type { EncodeOutcome, EncodeRequest, Encoder } from './encoder.js';
import { ConversionError } from './errors.js';
import { INDETERMINATE, type JobProgress, type JobStatus } from './types.js';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

type Behaviour = (request: EncodeRequest) => Promise<EncodeOutcome>;

const succeed: Behaviour = async (request) => {
  await delay(5);
  request.onProgress({
    elapsedMs: 500,
    progress: request.durationMs ? 500 / request.durationMs : INDETERMINATE,
    final: false,
  });
  await fs.writeFile(request.outputPath, 'video');
  return { status: 'success', outputPath: request.outputPath, logTail: [] };
};

const waitForAbort: Behaviour = (request) =>
  new Promise((resolve) => {
    request.signal?.addEventListener('abort', () => resolve({ status: 'cancelled', logTail: ['stopped'] }), {
      once: true,
    });
  });

class FakeEncoder implements Encoder {
  readonly requests: EncodeRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(public behaviour: Behaviour = succeed) {}

  async encode(request: EncodeRequest): Promise<EncodeOutcome> {
    this.requests.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.behaviour(request);
    } finally {
      this.active -= 1;
    }
  }
}

const knownDurations = (known: Record<string, number>): DurationLookup => ({
  resolve: async (audioPath) => {
    const durationMs = known[path.basename(audioPath)];
    return durationMs === undefined ? { source: 'unknown' } : { durationMs, source: 'ffprobe' };
  },
});

const thrownBy = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('ConversionController', () => {
  let workDir: string;
  let outputDir: string;
  let coverImagePath: string;
  let encoder: FakeEncoder;

  const audio = async (name: string): Promise<string> => {
    const audioPath = path.join(workDir, name);
    await fs.writeFile(audioPath, 'audio');
    return audioPath;
  };

  const createController = (
    options: { concurrency?: number; cover?: boolean; durations?: DurationLookup } = {},
  ): ConversionController =>
    new ConversionController({
      outputDir,
      coverImagePath: options.cover === false ? undefined : coverImagePath,
      concurrency: options.concurrency ?? 1,
      encoder,
      durations: options.durations ?? knownDurations({ 'a.mp3': 1000, 'b.wav': 2000, 'd.ogg': 4000, 'e.m4a': 4000 }),
    });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stillframe-controller-'));
    outputDir = path.join(workDir, 'out');
    coverImagePath = path.join(workDir, 'cover.png');
    await fs.writeFile(coverImagePath, 'image');
    encoder = new FakeEncoder();
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  it('converts every queued file in order', async () => {
    const controller = createController();
    const statuses: Array<[string, JobStatus]> = [];
    controller.on('status', ({ job, status }) => statuses.push([path.basename(job.inputAudioPath), status]));
    const drained = vi.fn();
    controller.on('drained', drained);

    controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav')]);
    controller.start();
    expect(controller.isRunning()).toBe(true);
    await controller.whenIdle();

    expect(statuses).toEqual([
      ['a.mp3', 'running'],
      ['a.mp3', 'completed'],
      ['b.wav', 'running'],
      ['b.wav', 'completed'],
    ]);
    const jobs = controller.listJobs();
    expect(jobs.map((job) => job.outputPath)).toEqual([path.join(outputDir, 'a.mpg'), path.join(outputDir, 'b.mpg')]);
    expect(jobs.map((job) => job.progress)).toEqual([1, 1]);
    expect(jobs.map((job) => job.coverImagePath)).toEqual([coverImagePath, coverImagePath]);
    expect(jobs.map((job) => job.durationMs)).toEqual([1000, 2000]);
    expect(await fs.pathExists(path.join(outputDir, 'b.mpg'))).toBe(true);
    expect(drained).toHaveBeenCalledTimes(1);
    expect(drained.mock.calls[0][0]).toMatchObject({ completed: 2, failed: 0, cancelled: 0 });
    expect(controller.isRunning()).toBe(false);
  });

  it('passes the resolved inputs to the encoder', async () => {
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await controller.whenIdle();

    expect(encoder.requests).toHaveLength(1);
    expect(encoder.requests[0]).toMatchObject({
      jobId: job.id,
      coverImagePath,
      audioPath: path.join(workDir, 'a.mp3'),
      outputPath: path.join(outputDir, 'a.mpg'),
      durationMs: 1000,
    });
  });

  it('shows indeterminate progress when the duration is unknown', async () => {
    const controller = createController();
    const progress: JobProgress[] = [];
    controller.on('progress', (event) => progress.push(event.progress));

    const [job] = controller.addAudioFiles([await audio('c.flac')]);
    controller.start();
    await controller.whenIdle();

    expect(progress).toEqual([INDETERMINATE, INDETERMINATE]);
    expect(controller.getJob(job.id)).toMatchObject({ status: 'completed', progress: 1 });
    expect(controller.getJob(job.id)?.durationMs).toBeUndefined();
  });

  it('never lets progress go backwards', async () => {
    encoder.behaviour = async (request) => {
      request.onProgress({ elapsedMs: 600, progress: 0.6, final: false });
      request.onProgress({ elapsedMs: 400, progress: 0.4, final: false });
      return { status: 'success', outputPath: request.outputPath, logTail: [] };
    };
    const controller = createController();
    const progress: JobProgress[] = [];
    controller.on('progress', (event) => progress.push(event.progress));
    controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await controller.whenIdle();

    expect(progress).toEqual([0.6, 0.6]);
  });

  it('skips names that already exist in the output folder', async () => {
    await fs.outputFile(path.join(outputDir, 'a.mpg'), 'older video');
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await controller.whenIdle();

    expect(controller.getJob(job.id)?.outputPath).toBe(path.join(outputDir, 'a (1).mpg'));
  });

  it('cancels a queued job without encoding it', async () => {
    const controller = createController();
    const [first, second] = controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav')]);
    controller.start();
    controller.cancel(second.id);
    expect(controller.getJob(second.id)?.status).toBe('cancelled');
    await controller.whenIdle();

    expect(encoder.requests.map((request) => request.jobId)).toEqual([first.id]);
    expect(controller.getJob(first.id)?.status).toBe('completed');
  });

  it('cancels a running job through the encoder', async () => {
    encoder.behaviour = waitForAbort;
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await vi.waitFor(() => expect(encoder.requests).toHaveLength(1));

    controller.cancel(job.id);
    await controller.whenIdle();

    expect(controller.getJob(job.id)).toMatchObject({ status: 'cancelled', logTail: ['stopped'] });
  });

  it('cancels a job while its duration is still being looked up', async () => {
    const resolve = vi.fn(async () => {
      await delay(3000);
      return { durationMs: 1000, source: 'ffprobe' as const };
    });
    const controller = createController({ durations: { resolve } });
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await vi.waitFor(() => expect(resolve).toHaveBeenCalledTimes(1));

    const cancelledAt = Date.now();
    controller.cancel(job.id);
    await controller.whenIdle();

    expect(Date.now() - cancelledAt).toBeLessThan(1000);
    expect(controller.getJob(job.id)?.status).toBe('cancelled');
    expect(encoder.requests).toHaveLength(0);
  });

  it('hands the job signal to the duration lookup', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const controller = createController({
      durations: {
        resolve: (_audioPath, signal) => {
          signals.push(signal);
          return new Promise((resolve) => {
            signal?.addEventListener('abort', () => resolve({ source: 'unknown' }), { once: true });
          });
        },
      },
    });
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await vi.waitFor(() => expect(signals).toHaveLength(1));

    controller.cancel(job.id);
    await controller.whenIdle();

    expect(signals[0]?.aborted).toBe(true);
    expect(controller.getJob(job.id)?.status).toBe('cancelled');
    expect(encoder.requests).toHaveLength(0);
  });

  it('keeps going when an event listener throws', async () => {
    const controller = createController();
    controller.on('status', ({ status }) => {
      if (status === 'completed') {
        throw new Error('listener broke');
      }
    });
    const drained = vi.fn();
    controller.on('drained', drained);
    const [first, second] = controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav')]);
    controller.start();
    await controller.whenIdle();

    expect(controller.getJob(first.id)).toMatchObject({ status: 'completed', progress: 1 });
    expect(controller.getJob(second.id)?.status).toBe('completed');
    expect(drained).toHaveBeenCalledTimes(1);
    expect(controller.isRunning()).toBe(false);
  });

  it('ignores cancel on finished jobs and rejects unknown ids', async () => {
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await controller.whenIdle();

    controller.cancel(job.id);
    expect(controller.getJob(job.id)?.status).toBe('completed');
    expect(thrownBy(() => controller.cancel('missing'))).toMatchObject({ kind: 'JobNotFound' });
  });

  it('cancels everything that has not finished', async () => {
    encoder.behaviour = waitForAbort;
    const controller = createController();
    controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav'), await audio('c.flac')]);
    controller.start();
    await vi.waitFor(() => expect(encoder.requests).toHaveLength(1));

    controller.cancelAll();
    await controller.whenIdle();

    expect(controller.listJobs().map((job) => job.status)).toEqual(['cancelled', 'cancelled', 'cancelled']);
    expect(encoder.requests).toHaveLength(1);
  });

  it('retries a failed job as a new queue entry', async () => {
    encoder.behaviour = async () => ({
      status: 'failure',
      error: new ConversionError('EncoderExitedNonZero', 'ffmpeg exited with code 1'),
      logTail: ['Invalid data found when processing input'],
    });
    const controller = createController();
    const [failedJob] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.start();
    await controller.whenIdle();

    const failed = controller.getJob(failedJob.id);
    expect(failed).toMatchObject({
      status: 'failed',
      errorKind: 'EncoderExitedNonZero',
      errorMessage: 'ffmpeg exited with code 1',
      logTail: ['Invalid data found when processing input'],
    });

    encoder.behaviour = succeed;
    const submitted = vi.fn();
    controller.on('submitted', submitted);
    const retried = controller.retry(failedJob.id);
    expect(retried).toMatchObject({ status: 'queued', progress: 0, retryOf: failedJob.id });
    expect(retried.id).not.toBe(failedJob.id);
    expect(submitted).toHaveBeenCalledWith({ job: retried });

    controller.start();
    await controller.whenIdle();

    expect(controller.getJob(failedJob.id)).toEqual(failed);
    expect(controller.getJob(retried.id)).toMatchObject({
      status: 'completed',
      outputPath: path.join(outputDir, 'a.mpg'),
    });
    expect(controller.listJobs().map((job) => job.id)).toEqual([failedJob.id, retried.id]);
  });

  it('refuses to retry a job that has not failed or been cancelled', async () => {
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    expect(thrownBy(() => controller.retry(job.id))).toMatchObject({ kind: 'InvalidRetry' });
  });

  it('keeps running jobs when removing or clearing', async () => {
    encoder.behaviour = waitForAbort;
    const controller = createController();
    const [running, queued] = controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav')]);
    controller.start();
    await vi.waitFor(() => expect(encoder.requests).toHaveLength(1));

    expect(thrownBy(() => controller.remove(running.id))).toMatchObject({ kind: 'JobBusy' });
    expect(controller.clearAll()).toEqual({ kind: 'partial', removed: 1, retained: 1 });
    expect(controller.getJob(queued.id)).toBeUndefined();

    controller.cancel(running.id);
    await controller.whenIdle();
    expect(controller.clearAll()).toEqual({ kind: 'all-removed', removed: 1 });
  });

  it('fails a job whose audio file is missing and moves on', async () => {
    const controller = createController();
    const [missing, present] = controller.addAudioFiles([path.join(workDir, 'gone.mp3'), await audio('b.wav')]);
    controller.start();
    await controller.whenIdle();

    expect(controller.getJob(missing.id)).toMatchObject({ status: 'failed', errorKind: 'InputMissing' });
    expect(controller.getJob(present.id)?.status).toBe('completed');
    expect(encoder.requests).toHaveLength(1);
  });

  it('fails the remaining queue when ffmpeg cannot be launched', async () => {
    encoder.behaviour = async () => ({
      status: 'failure',
      error: new ConversionError('LaunchFailed', 'Failed to launch ffmpeg'),
      logTail: [],
    });
    const controller = createController();
    const drained = vi.fn();
    controller.on('drained', drained);
    controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav'), await audio('c.flac')]);
    controller.start();
    await controller.whenIdle();

    expect(controller.listJobs().map((job) => [job.status, job.errorKind, job.errorMessage])).toEqual([
      ['failed', 'LaunchFailed', 'Failed to launch ffmpeg'],
      ['failed', 'LaunchFailed', 'Failed to launch ffmpeg'],
      ['failed', 'LaunchFailed', 'Failed to launch ffmpeg'],
    ]);
    expect(encoder.requests).toHaveLength(1);
    expect(drained.mock.calls[0][0]).toMatchObject({ completed: 0, failed: 3, cancelled: 0 });
  });

  it('never runs more jobs at once than its concurrency', async () => {
    encoder.behaviour = async (request) => {
      await delay(15);
      return succeed(request);
    };
    const controller = createController({ concurrency: 2 });
    controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav'), await audio('d.ogg'), await audio('e.m4a')]);
    controller.start();
    await controller.whenIdle();

    expect(encoder.maxActive).toBe(2);
    expect(controller.listJobs().every((job) => job.status === 'completed')).toBe(true);
  });

  it('picks up files added while running', async () => {
    const controller = createController();
    controller.addAudioFiles([await audio('a.mp3')]);
    const extra = await audio('b.wav');
    controller.start();
    const [late] = controller.addAudioFiles([extra]);
    await controller.whenIdle();

    expect(controller.getJob(late.id)?.status).toBe('completed');
  });

  it('applies a new cover only to jobs that have not started', async () => {
    encoder.behaviour = async (request) => {
      const otherCover = path.join(workDir, 'other.png');
      await fs.writeFile(otherCover, 'image');
      controller.setCoverImage(otherCover);
      return succeed(request);
    };
    const controller = createController();
    const [first, second] = controller.addAudioFiles([await audio('a.mp3'), await audio('b.wav')]);
    controller.start();
    await controller.whenIdle();

    expect(controller.getJob(first.id)?.coverImagePath).toBe(coverImagePath);
    expect(controller.getJob(second.id)?.coverImagePath).toBe(path.join(workDir, 'other.png'));
  });

  it('validates the session before starting', async () => {
    const controller = createController({ cover: false });
    expect(thrownBy(() => controller.start())).toMatchObject({ kind: 'EmptyAudioList' });
    controller.addAudioFiles([await audio('a.mp3')]);
    expect(thrownBy(() => controller.start())).toMatchObject({ kind: 'MissingCoverImage' });
    expect(controller.isRunning()).toBe(false);
  });

  it('does nothing when no job is queued', async () => {
    const controller = createController();
    const [job] = controller.addAudioFiles([await audio('a.mp3')]);
    controller.cancel(job.id);
    controller.start();
    expect(controller.isRunning()).toBe(false);
    await expect(controller.whenIdle()).resolves.toBeUndefined();
  });

  it('stops delivering events after unsubscribe', async () => {
    const controller = createController();
    const listener = vi.fn();
    const unsubscribe = controller.on('submitted', listener);
    controller.addAudioFiles([await audio('a.mp3')]);
    unsubscribe();
    controller.addAudioFiles([await audio('b.wav')]);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('rejects a concurrency below one', () => {
    expect(() => createController({ concurrency: 0 })).toThrow(RangeError);
  });
});
