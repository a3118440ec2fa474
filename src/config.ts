import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';

export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_PROBE_TIMEOUT_MS = 15_000;
export const DEFAULT_CANCEL_GRACE_MS = 5_000;
export const DEFAULT_LOG_TAIL_LINES = 40;
export const DEFAULT_OUTPUT_FOLDER_NAME = 'stillframe-exports';

export interface RuntimeConfig {
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  readonly concurrency: number;
  readonly probeTimeoutMs: number;
  readonly cancelGraceMs: number;
  readonly outputDir: string;
}

/**
 * Parses a positive integer, falling back when the value is missing or malformed.
 */
export const readPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

/**
 * Locates the user's desktop, preferring the OneDrive-synced one on Windows when the
 * regular folder is missing.
 */
export const getDesktopPath = (env: NodeJS.ProcessEnv = process.env): string => {
  if (process.platform === 'win32') {
    const profile = env.USERPROFILE ?? os.homedir();
    const desktop = path.join(profile, 'Desktop');
    if (fs.pathExistsSync(desktop)) {
      return desktop;
    }
    const oneDriveDesktop = path.join(profile, 'OneDrive', 'Desktop');
    return fs.pathExistsSync(oneDriveDesktop) ? oneDriveDesktop : desktop;
  }
  return path.join(os.homedir(), 'Desktop');
};

export const getDefaultOutputDir = (env: NodeJS.ProcessEnv = process.env): string =>
  path.join(getDesktopPath(env), DEFAULT_OUTPUT_FOLDER_NAME);

/**
 * Reads runtime settings from the environment. Binaries default to whatever `ffmpeg`
 * and `ffprobe` resolve to on PATH.
 */
export const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  ffmpegPath: env.FFMPEG_PATH?.trim() || 'ffmpeg',
  ffprobePath: env.FFPROBE_PATH?.trim() || 'ffprobe',
  concurrency: readPositiveInt(env.CONVERT_CONCURRENCY, DEFAULT_CONCURRENCY),
  probeTimeoutMs: readPositiveInt(env.PROBE_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS),
  cancelGraceMs: readPositiveInt(env.CANCEL_GRACE_MS, DEFAULT_CANCEL_GRACE_MS),
  outputDir: path.resolve(env.STILLFRAME_OUTPUT_DIR?.trim() || getDefaultOutputDir(env)),
});

/**
 * Points fluent-ffmpeg at the configured encoder so the inspection fallback uses the same
 * binary as encodes. ffprobe is spawned directly with `ffprobePath`.
 */
export const configureFluentFfmpeg = (config: Pick<RuntimeConfig, 'ffmpegPath'>): void => {
  ffmpeg.setFfmpegPath(config.ffmpegPath);
};
