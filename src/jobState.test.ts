import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConversionError } from './errors.js';
import { canTransition, createJob, createRetryJob, isTerminal, patchJob, transitionJob } from './jobState.js';

describe('createJob', () => {
  it('creates a queued job with an absolute input path', () => {
    const job = createJob('music/a.mp3', 'job-1');
    expect(job).toMatchObject({
      id: 'job-1',
      inputAudioPath: path.resolve('music/a.mp3'),
      status: 'queued',
      progress: 0,
      logTail: [],
    });
    expect(job.coverImagePath).toBeUndefined();
  });
});

describe('transitionJob', () => {
  it('follows the allowed lifecycle', () => {
    const running = transitionJob(createJob('a.mp3'), 'running', { coverImagePath: '/covers/x.png' });
    expect(running.status).toBe('running');
    expect(running.coverImagePath).toBe('/covers/x.png');
    const done = transitionJob(running, 'completed', { progress: 1 });
    expect(done.status).toBe('completed');
    expect(done.progress).toBe(1);
  });

  it('rejects moves out of terminal states', () => {
    const cancelled = transitionJob(createJob('a.mp3'), 'cancelled');
    expect(() => transitionJob(cancelled, 'running')).toThrow(ConversionError);
    expect(() => transitionJob(cancelled, 'running')).toThrow(/cannot move from cancelled to running/);
  });

  it('does not complete a job that never ran', () => {
    expect(canTransition('queued', 'completed')).toBe(false);
    expect(() => transitionJob(createJob('a.mp3'), 'completed')).toThrow(ConversionError);
  });

  it('keeps error details only on failure', () => {
    const running = transitionJob(createJob('a.mp3'), 'running');
    const failed = transitionJob(running, 'failed', { errorMessage: 'boom', errorKind: 'EncoderExitedNonZero' });
    expect(failed.errorMessage).toBe('boom');
    expect(failed.errorKind).toBe('EncoderExitedNonZero');

    const cancelled = transitionJob(running, 'cancelled', { errorMessage: 'ignored' });
    expect(cancelled.errorMessage).toBeUndefined();
  });

  it('gives failures a default message', () => {
    const failed = transitionJob(createJob('a.mp3'), 'failed');
    expect(failed.errorMessage).toBe('Conversion failed');
  });
});

describe('patchJob', () => {
  it('changes fields without touching the status', () => {
    const running = transitionJob(createJob('a.mp3'), 'running');
    const patched = patchJob(running, { progress: 0.4 });
    expect(patched.status).toBe('running');
    expect(patched.progress).toBe(0.4);
    expect(running.progress).toBe(0);
  });
});

describe('createRetryJob', () => {
  it('starts a fresh lifecycle for the same audio', () => {
    const running = transitionJob(createJob('a.mp3', 'old'), 'running', { coverImagePath: '/c.png' });
    const failed = transitionJob(running, 'failed', { errorMessage: 'boom', progress: 0.3 });
    const retry = createRetryJob(failed, 'new');
    expect(retry).toMatchObject({
      id: 'new',
      inputAudioPath: failed.inputAudioPath,
      status: 'queued',
      progress: 0,
      retryOf: 'old',
    });
    expect(retry.errorMessage).toBeUndefined();
    expect(retry.coverImagePath).toBeUndefined();
    expect(failed.status).toBe('failed');
  });

  it('refuses jobs that are not failed or cancelled', () => {
    expect(() => createRetryJob(createJob('a.mp3'))).toThrow(/only failed or cancelled jobs can be retried/);
  });
});

describe('isTerminal', () => {
  it('marks finished states', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
    expect(isTerminal('running')).toBe(false);
  });
});
