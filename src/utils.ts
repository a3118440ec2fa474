import path from 'node:path';
import fs from 'fs-extra';

export const DEFAULT_AUDIO_LIST_FILE = path.resolve(process.cwd(), 'audio.txt');
export const ERRORS_LOG = path.resolve(process.cwd(), 'errors.log');
export const CONVERTED_LOG = path.resolve(process.cwd(), 'converted.log');

const SUPPORTED_AUDIO_EXTENSIONS = new Set([
  '.m4a',
  '.mp3',
  '.wav',
  '.aac',
  '.flac',
  '.ogg',
  '.wma',
  '.opus',
  '.aiff',
  '.aif',
  '.mp2',
  // containers that usually carry an audio track
  '.mp4',
  '.webm',
  '.mkv',
  '.avi',
]);

const SUPPORTED_IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.bmp', '.gif', '.webp', '.tiff', '.tif']);

/**
 * Checks whether ffmpeg can be expected to read audio from this file.
 */
export const isSupportedAudioFile = (filePath: string): boolean =>
  SUPPORTED_AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());

/**
 * Checks whether the file can serve as a still cover image.
 */
export const isSupportedImageFile = (filePath: string): boolean =>
  SUPPORTED_IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());

/**
 * Ensures the output directory exists so encodes have a target path.
 */
export const ensureOutputDir = async (dir: string): Promise<string> => {
  const resolved = path.resolve(dir);
  await fs.ensureDir(resolved);
  return resolved;
};

/**
 * Reads audio paths from a list file, one per line, skipping blanks and `#` comments.
 * Relative entries resolve against the list file's folder.
 */
export const readAudioList = async (filePath: string = DEFAULT_AUDIO_LIST_FILE): Promise<string[]> => {
  const exists = await fs.pathExists(filePath);
  if (!exists) {
    return [];
  }
  const raw = await fs.readFile(filePath, 'utf-8');
  const baseDir = path.dirname(path.resolve(filePath));
  return raw
    .split(/\r?\n/)
    .map((line: string) => line.trim())
    .filter((line: string) => line.length > 0 && !line.startsWith('#'))
    .map((line: string) => path.resolve(baseDir, line));
};

/**
 * Formats milliseconds as `HH:MM:SS`.
 */
export const formatDuration = (durationMs: number): string => {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    return '00:00:00';
  }
  const totalSeconds = Math.floor(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((value) => String(value).padStart(2, '0')).join(':');
};

/**
 * Settles with `work`, or with `undefined` as soon as `signal` aborts. The work itself is
 * not stopped; its later result or error is dropped.
 */
export const untilAborted = <T>(work: Promise<T>, signal?: AbortSignal): Promise<T | undefined> => {
  if (!signal) {
    return work;
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(undefined);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

export interface LineBuffer {
  push(chunk: string): void;
  flush(): void;
}

/**
 * Splits arbitrary text chunks into complete lines, holding back a trailing partial line
 * until more data or `flush()` arrives.
 */
export const createLineBuffer = (onLine: (line: string) => void): LineBuffer => {
  let pending = '';
  return {
    push(chunk: string): void {
      pending += chunk;
      const lines = pending.split(/\r?\n|\r/);
      pending = lines.pop() ?? '';
      for (const line of lines) {
        onLine(line);
      }
    },
    flush(): void {
      if (pending.length > 0) {
        const last = pending;
        pending = '';
        onLine(last);
      }
    },
  };
};

/**
 * Appends error information to a persistent log so the user can review failures.
 */
export const logFailure = async (message: string, logFile: string = ERRORS_LOG): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(logFile, `[${timestamp}] ${message}\n`);
};

/**
 * Records a finished video next to the audio it came from.
 */
export const logSuccess = async (
  outputPath: string,
  audioPath: string,
  logFile: string = CONVERTED_LOG,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(logFile, `[${timestamp}] ${path.basename(audioPath)} -> ${outputPath}\n`);
};

/**
 * Logs a session summary block with per-status totals.
 */
export const logSessionSummary = async (
  outputDir: string,
  counts: { readonly total: number; readonly completed: number; readonly failed: number; readonly cancelled: number },
  logFile: string = CONVERTED_LOG,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(
    logFile,
    `\n[${timestamp}] ========================================\n` +
      `[${timestamp}] SESSION SUMMARY: ${outputDir}\n` +
      `[${timestamp}] COMPLETED: ${counts.completed}/${counts.total} files\n` +
      `[${timestamp}] FAILED: ${counts.failed} CANCELLED: ${counts.cancelled}\n` +
      `[${timestamp}] ========================================\n\n`,
  );
};
