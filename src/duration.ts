import os from 'node:os';
import ffmpeg from 'fluent-ffmpeg';
import { ConversionError, toConversionError } from './errors.js';
import { makeDebug } from './debug.js';
import { parseTimecodeMs } from './progress.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from './config.js';
import { spawnWithoutShell, type EncoderProcess, type SpawnEncoderProcess } from './encoder.js';
import { untilAborted } from './utils.js';
import type { DurationResult } from './types.js';

/**
 * Looks up a duration in milliseconds. Resolving `undefined` or rejecting both mean
 * "no usable answer"; an aborted lookup resolves `undefined` after stopping its process.
 */
export type DurationProbe = (audioPath: string, timeoutMs: number, signal?: AbortSignal) => Promise<number | undefined>;

export interface DurationLookup {
  resolve(audioPath: string, signal?: AbortSignal): Promise<DurationResult>;
}

export interface DurationResolverOptions {
  readonly timeoutMs?: number;
  readonly ffprobePath?: string;
  readonly probe?: DurationProbe;
  readonly inspect?: DurationProbe;
}

const debug = makeDebug('duration');

const toPositiveMs = (value: number | undefined): number | undefined =>
  value !== undefined && Number.isFinite(value) && value > 0 ? Math.round(value) : undefined;

export const buildFfprobeArgs = (audioPath: string): string[] => [
  '-v',
  'error',
  '-show_entries',
  'format=duration',
  '-of',
  'default=noprint_wrappers=1:nokey=1',
  audioPath,
];

/**
 * Reads `format.duration` through ffprobe. The process is killed on timeout or abort, so
 * a hung probe never outlives its job.
 */
export const createFfprobeProbe =
  (ffprobePath = 'ffprobe', spawnProcess: SpawnEncoderProcess = spawnWithoutShell): DurationProbe =>
  (audioPath, timeoutMs, signal) =>
    new Promise((resolve, reject) => {
      if (signal?.aborted) {
        resolve(undefined);
        return;
      }

      let child: EncoderProcess;
      try {
        child = spawnProcess(ffprobePath, buildFfprobeArgs(audioPath));
      } catch (error) {
        reject(toConversionError(error, 'ProbeFailed'));
        return;
      }

      let settled = false;
      let output = '';
      const stop = (): void => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      };
      const settle = (done: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        done();
      };
      const onAbort = (): void => {
        stop();
        settle(() => resolve(undefined));
      };
      const timer = setTimeout(() => {
        stop();
        settle(() => reject(new ConversionError('ProbeFailed', `ffprobe did not answer within ${timeoutMs} ms`)));
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        output += chunk;
      });
      child.stderr.resume();
      child.on('error', (error) => {
        settle(() => reject(toConversionError(error, 'ProbeFailed')));
      });
      child.once('close', (code) => {
        settle(() => {
          if (code !== 0) {
            reject(new ConversionError('ProbeFailed', `ffprobe exited with code ${code}`));
            return;
          }
          resolve(toPositiveMs(Number.parseFloat(output.trim()) * 1000));
        });
      });
    });

/**
 * Falls back to ffmpeg's own input inspection: the `Duration:` header arrives with the
 * `codecData` event, after which the process is killed instead of decoding the file.
 */
export const inspectWithFfmpeg: DurationProbe = (audioPath, timeoutMs, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(undefined);
      return;
    }

    let settled = false;
    const command = ffmpeg(audioPath, { timeout: Math.max(1, Math.ceil(timeoutMs / 1000)) })
      .noVideo()
      .format('null')
      .output(os.devNull);

    const settle = (value: number | undefined): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(value);
    };

    const onAbort = (): void => {
      command.kill('SIGKILL');
      settle(undefined);
    };

    const timer = setTimeout(() => {
      debug('ffmpeg inspection timed out for %s', audioPath);
      command.kill('SIGKILL');
      settle(undefined);
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    command
      .on('codecData', (data: unknown) => {
        const raw =
          typeof data === 'object' && data !== null && 'duration' in data && typeof data.duration === 'string'
            ? data.duration
            : undefined;
        settle(toPositiveMs(parseTimecodeMs(raw)));
        command.kill('SIGKILL');
      })
      .on('error', (error: Error) => {
        if (!settled) {
          debug('ffmpeg inspection failed for %s: %s', audioPath, error.message);
        }
        settle(undefined);
      })
      .on('end', () => {
        settle(undefined);
      })
      .run();
  });

/**
 * Determines a job's audio duration: ffprobe first, ffmpeg inspection second, and
 * `unknown` (indeterminate progress) when neither answers or the job was cancelled.
 */
export class DurationResolver implements DurationLookup {
  private readonly timeoutMs: number;
  private readonly probe: DurationProbe;
  private readonly inspect: DurationProbe;

  constructor(options: DurationResolverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.probe = options.probe ?? createFfprobeProbe(options.ffprobePath);
    this.inspect = options.inspect ?? inspectWithFfmpeg;
  }

  async resolve(audioPath: string, signal?: AbortSignal): Promise<DurationResult> {
    const probed = await this.attempt('ffprobe', this.probe, audioPath, signal);
    if (probed !== undefined) {
      return { durationMs: probed, source: 'ffprobe' };
    }
    if (signal?.aborted) {
      return { source: 'unknown' };
    }

    const inspected = await this.attempt('ffmpeg', this.inspect, audioPath, signal);
    if (inspected !== undefined) {
      return { durationMs: inspected, source: 'ffmpeg' };
    }

    debug('ProbeFailed: duration unknown for %s, progress will be indeterminate', audioPath);
    return { source: 'unknown' };
  }

  private async attempt(
    label: string,
    probe: DurationProbe,
    audioPath: string,
    signal?: AbortSignal,
  ): Promise<number | undefined> {
    try {
      return toPositiveMs(await untilAborted(probe(audioPath, this.timeoutMs, signal), signal));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debug('%s probe failed for %s: %s', label, audioPath, message);
      return undefined;
    }
  }
}
