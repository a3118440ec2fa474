import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import fs from 'fs-extra';
import { ConversionError, errorCode } from './errors.js';
import { makeDebug } from './debug.js';
import { createLogTail, type LogTail } from './logTail.js';
import { ProgressParser } from './progress.js';
import { createLineBuffer } from './utils.js';
import { DEFAULT_CANCEL_GRACE_MS, DEFAULT_LOG_TAIL_LINES } from './config.js';
import type { ProgressSnapshot } from './types.js';

/**
 * Fixed output profile: MPEG-2 video with MP2 audio in an MPEG program stream.
 */
export const VIDEO_PROFILE = {
  width: 1280,
  height: 720,
  fps: 30,
  videoCodec: 'mpeg2video',
  videoBitrate: '4000k',
  audioCodec: 'mp2',
  audioBitrate: '192k',
  pixelFormat: 'yuv420p',
  container: 'mpeg',
} as const;

export interface EncodeRequest {
  readonly jobId: string;
  readonly coverImagePath: string;
  readonly audioPath: string;
  readonly outputPath: string;
  readonly durationMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress: (snapshot: ProgressSnapshot) => void;
  readonly onLog?: (line: string) => void;
}

export type EncodeOutcome =
  | { readonly status: 'success'; readonly outputPath: string; readonly logTail: readonly string[] }
  | { readonly status: 'failure'; readonly error: ConversionError; readonly logTail: readonly string[] }
  | { readonly status: 'cancelled'; readonly logTail: readonly string[] };

/**
 * Out-of-process encoder. Implementations must settle with an outcome instead of
 * rejecting, and must leave no child process behind.
 */
export interface Encoder {
  encode(request: EncodeRequest): Promise<EncodeOutcome>;
}

/**
 * The slice of a spawned child process the encoder relies on.
 */
export interface EncoderProcess {
  /** Undefined when the operating system refused to start the process. */
  readonly pid?: number;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnEncoderProcess = (command: string, args: readonly string[]) => EncoderProcess;

export interface FfmpegEncoderOptions {
  readonly ffmpegPath?: string;
  readonly cancelGraceMs?: number;
  readonly logTailLines?: number;
  readonly spawnProcess?: SpawnEncoderProcess;
}

type ExitResult =
  | { readonly kind: 'exit'; readonly code: number | null; readonly signal: NodeJS.Signals | null }
  | { readonly kind: 'launch-error'; readonly error: Error };

const debug = makeDebug('encoder');

/**
 * Spawns without a shell: arguments reach ffmpeg verbatim, whatever spaces or accents
 * the paths contain.
 */
export const spawnWithoutShell: SpawnEncoderProcess = (command, args) =>
  spawn(command, [...args], {
    shell: false,
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });

const formatSeconds = (durationMs: number): string => (durationMs / 1000).toFixed(3);

/**
 * Builds the ffmpeg invocation for one job: the cover looped as video input 0, the
 * audio as input 1, progress on stdout and diagnostics on stderr.
 */
export const buildEncoderArgs = (
  request: Pick<EncodeRequest, 'coverImagePath' | 'audioPath' | 'outputPath' | 'durationMs'>,
): string[] => {
  const { width, height, fps } = VIDEO_PROFILE;
  const scaleFilter = [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
    `format=${VIDEO_PROFILE.pixelFormat}`,
  ].join(',');

  const args = [
    '-hide_banner',
    '-nostdin',
    '-y',
    '-loop',
    '1',
    '-framerate',
    String(fps),
    '-i',
    request.coverImagePath,
    '-i',
    request.audioPath,
    '-map',
    '0:v:0',
    '-map',
    '1:a:0',
    '-vf',
    scaleFilter,
    '-r',
    String(fps),
    '-c:v',
    VIDEO_PROFILE.videoCodec,
    '-b:v',
    VIDEO_PROFILE.videoBitrate,
    '-c:a',
    VIDEO_PROFILE.audioCodec,
    '-b:a',
    VIDEO_PROFILE.audioBitrate,
    '-shortest',
  ];

  if (request.durationMs !== undefined && request.durationMs > 0) {
    args.push('-t', formatSeconds(request.durationMs));
  }

  args.push('-f', VIDEO_PROFILE.container, '-progress', 'pipe:1', '-nostats', request.outputPath);
  return args;
};

/**
 * Runs ffmpeg for a single job and reports exactly one terminal outcome.
 */
export class FfmpegEncoder implements Encoder {
  private readonly ffmpegPath: string;
  private readonly cancelGraceMs: number;
  private readonly logTailLines: number;
  private readonly spawnProcess: SpawnEncoderProcess;

  constructor(options: FfmpegEncoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.cancelGraceMs = options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
    this.logTailLines = options.logTailLines ?? DEFAULT_LOG_TAIL_LINES;
    this.spawnProcess = options.spawnProcess ?? spawnWithoutShell;
  }

  async encode(request: EncodeRequest): Promise<EncodeOutcome> {
    const tail = createLogTail(this.logTailLines);
    if (request.signal?.aborted) {
      return { status: 'cancelled', logTail: [] };
    }

    const args = buildEncoderArgs(request);
    debug('job %s: %s %o', request.jobId, this.ffmpegPath, args);

    let child: EncoderProcess;
    try {
      child = this.spawnProcess(this.ffmpegPath, args);
    } catch (error) {
      return this.fail(request, tail, this.launchError(error));
    }

    const parser = new ProgressParser(request.durationMs);
    this.pipeLines(child.stdout, (line) => {
      const snapshot = parser.push(line);
      if (snapshot) {
        request.onProgress(snapshot);
      }
    });
    this.pipeLines(child.stderr, (line) => {
      const trimmed = line.trim();
      if (!trimmed) {
        return;
      }
      tail.push(trimmed);
      request.onLog?.(trimmed);
    });

    let cancelled = false;
    let forceKillTimer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      if (cancelled) {
        return;
      }
      cancelled = true;
      debug('job %s: cancellation requested, sending SIGTERM', request.jobId);
      child.kill('SIGTERM');
      forceKillTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          debug('job %s: still alive after %d ms, sending SIGKILL', request.jobId, this.cancelGraceMs);
          child.kill('SIGKILL');
        }
      }, this.cancelGraceMs);
    };
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const result = await this.waitForExit(child, (error) => {
      debug('job %s: process error %s', request.jobId, error.message);
      tail.push(`ffmpeg process error: ${error.message}`);
    });
    request.signal?.removeEventListener('abort', onAbort);
    if (forceKillTimer) {
      clearTimeout(forceKillTimer);
    }
    debug('job %s: exit %o', request.jobId, result);

    if (result.kind === 'launch-error') {
      return this.fail(request, tail, this.launchError(result.error));
    }

    if (cancelled) {
      await this.discardOutput(request.outputPath, tail);
      return { status: 'cancelled', logTail: tail.lines() };
    }

    if (result.code !== 0) {
      const reason = result.signal ? `was terminated by ${result.signal}` : `exited with code ${result.code}`;
      return this.fail(request, tail, new ConversionError('EncoderExitedNonZero', `ffmpeg ${reason}`));
    }

    if (!parser.finished) {
      return this.fail(
        request,
        tail,
        new ConversionError('OutputIncomplete', 'ffmpeg exited before reporting the end of its progress stream'),
      );
    }

    if (!(await fs.pathExists(request.outputPath))) {
      return this.fail(request, tail, new ConversionError('OutputIncomplete', 'ffmpeg did not create the output file'));
    }

    return { status: 'success', outputPath: request.outputPath, logTail: tail.lines() };
  }

  private pipeLines(stream: Readable, onLine: (line: string) => void): void {
    const buffer = createLineBuffer(onLine);
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => buffer.push(chunk));
    stream.on('end', () => buffer.flush());
  }

  /**
   * Only an `error` from a process that never got a pid is a launch failure. Later
   * errors (a failed `kill()`, for one) go to `onRuntimeError` and the exit decides.
   */
  private waitForExit(child: EncoderProcess, onRuntimeError: (error: Error) => void): Promise<ExitResult> {
    return new Promise((resolve) => {
      child.on('error', (error) => {
        if (child.pid === undefined) {
          resolve({ kind: 'launch-error', error });
          return;
        }
        onRuntimeError(error);
      });
      child.once('close', (code, signal) => {
        resolve({ kind: 'exit', code, signal });
      });
    });
  }

  private launchError(error: unknown): ConversionError {
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    const hint = code === 'ENOENT' ? ' Install ffmpeg or set FFMPEG_PATH to the executable.' : '';
    return new ConversionError('LaunchFailed', `Failed to launch ffmpeg at "${this.ffmpegPath}": ${detail}.${hint}`, {
      cause: error,
    });
  }

  private async fail(request: EncodeRequest, tail: LogTail, error: ConversionError): Promise<EncodeOutcome> {
    await this.discardOutput(request.outputPath, tail);
    return { status: 'failure', error, logTail: tail.lines() };
  }

  private async discardOutput(outputPath: string, tail: LogTail): Promise<void> {
    try {
      await fs.remove(outputPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debug('could not remove partial output %s: %s', outputPath, message);
      tail.push(`Could not remove partial output ${outputPath}: ${message}`);
    }
  }
}
