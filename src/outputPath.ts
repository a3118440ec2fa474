import path from 'node:path';
import fs from 'fs-extra';
import pLimit from 'p-limit';
import { ConversionError } from './errors.js';
import { makeDebug } from './debug.js';

export interface OutputPathResolverOptions {
  readonly extension?: string;
  readonly maxAttempts?: number;
  readonly exists?: (candidate: string) => Promise<boolean>;
}

export const DEFAULT_OUTPUT_EXTENSION = 'mpg';
export const DEFAULT_MAX_NAME_ATTEMPTS = 10_000;

const debug = makeDebug('output');

/**
 * Builds the n-th candidate name: `base.ext` first, then `base (n).ext`.
 */
export const buildCandidateName = (baseName: string, extension: string, attempt: number): string =>
  attempt === 0 ? `${baseName}.${extension}` : `${baseName} (${attempt}).${extension}`;

/**
 * Returns the audio file name without directory and extension.
 */
export const outputBaseName = (audioPath: string): string => path.parse(audioPath).name.trim() || 'output';

export interface OutputPathResolver {
  reserve(directory: string, baseName: string): Promise<string>;
  /** Drops a reservation once its job has ended. */
  release(outputPath: string): void;
  isReserved(outputPath: string): boolean;
}

/**
 * Hands out collision-free output paths. Lookups and reservations share one critical
 * section, so concurrent jobs never receive the same name.
 */
export const createOutputPathResolver = (options: OutputPathResolverOptions = {}): OutputPathResolver => {
  const reserved = new Set<string>();
  const critical = pLimit(1);
  const extension = (options.extension ?? DEFAULT_OUTPUT_EXTENSION).replace(/^\./, '');
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_NAME_ATTEMPTS;
  const exists = options.exists ?? ((candidate: string) => fs.pathExists(candidate));

  const claim = async (directory: string, baseName: string): Promise<string> => {
    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const candidate = path.join(directory, buildCandidateName(baseName, extension, attempt));
      if (reserved.has(candidate) || (await exists(candidate))) {
        continue;
      }
      reserved.add(candidate);
      debug('reserved %s', candidate);
      return candidate;
    }
    throw new ConversionError(
      'NamingCollisionExhausted',
      `No free output name for "${baseName}.${extension}" after ${maxAttempts} attempts in ${directory}`,
    );
  };

  return {
    reserve: (directory, baseName) => critical(() => claim(path.resolve(directory), baseName.trim() || 'output')),
    release: (outputPath) => {
      reserved.delete(path.resolve(outputPath));
    },
    isReserved: (outputPath) => reserved.has(path.resolve(outputPath)),
  };
};
