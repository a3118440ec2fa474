import { INDETERMINATE, type JobProgress, type ProgressSnapshot } from './types.js';

/**
 * Reducer state for ffmpeg's `-progress` output. Values are plain data so a state can be
 * stored, copied or restarted freely.
 */
export interface ProgressParserState {
  readonly pending: Readonly<Record<string, string>>;
  readonly lastElapsedMs: number;
  readonly lastFraction: number;
  readonly finished: boolean;
}

export interface ProgressStep {
  readonly state: ProgressParserState;
  readonly snapshot?: ProgressSnapshot;
}

const SENTINEL_KEY = 'progress';

export const initialProgressState = (): ProgressParserState => ({
  pending: {},
  lastElapsedMs: 0,
  lastFraction: 0,
  finished: false,
});

const parseFiniteNumber = (value?: string): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Parses `HH:MM:SS(.fraction)` into milliseconds. Used for both `out_time` and the
 * `Duration:` header ffmpeg prints for its inputs.
 */
export const parseTimecodeMs = (value?: string): number | undefined => {
  if (!value) {
    return undefined;
  }
  const match = /^(-)?(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, negative, hours, minutes, seconds] = match;
  const totalMs =
    (Number.parseInt(hours, 10) * 3600 + Number.parseInt(minutes, 10) * 60 + Number.parseFloat(seconds)) * 1000;
  return negative ? -totalMs : totalMs;
};

const readElapsedMs = (frame: Readonly<Record<string, string>>): number | undefined => {
  const micros = parseFiniteNumber(frame.out_time_us);
  if (micros !== undefined) {
    return micros / 1000;
  }
  // ffmpeg fills out_time_ms with microseconds as well.
  const mislabelled = parseFiniteNumber(frame.out_time_ms);
  if (mislabelled !== undefined) {
    return mislabelled / 1000;
  }
  return parseTimecodeMs(frame.out_time);
};

const parseSpeed = (value?: string): number | undefined =>
  value ? parseFiniteNumber(value.trim().replace(/x$/i, '')) : undefined;

/**
 * Maps elapsed output time onto a clamped fraction of the known duration.
 */
export const computeProgress = (elapsedMs: number, durationMs?: number): JobProgress => {
  if (durationMs === undefined || !Number.isFinite(durationMs) || durationMs <= 0) {
    return INDETERMINATE;
  }
  return Math.min(1, Math.max(0, elapsedMs / durationMs));
};

const commitFrame = (
  state: ProgressParserState,
  sentinel: string,
  durationMs?: number,
): ProgressStep => {
  const frame = state.pending;
  const parsedElapsed = readElapsedMs(frame);
  const elapsedMs = Math.max(state.lastElapsedMs, Math.max(0, parsedElapsed ?? 0));
  const computed = computeProgress(elapsedMs, durationMs);
  const progress = computed === INDETERMINATE ? computed : Math.max(state.lastFraction, computed);
  const final = sentinel === 'end';
  const frameNumber = parseFiniteNumber(frame.frame);
  const totalSize = parseFiniteNumber(frame.total_size);

  const snapshot: ProgressSnapshot = Object.freeze({
    elapsedMs,
    progress,
    final,
    frame: frameNumber !== undefined ? Math.trunc(frameNumber) : undefined,
    speed: parseSpeed(frame.speed),
    totalSizeBytes: totalSize !== undefined ? Math.trunc(totalSize) : undefined,
  });

  return {
    state: {
      pending: {},
      lastElapsedMs: elapsedMs,
      lastFraction: progress === INDETERMINATE ? state.lastFraction : progress,
      finished: final,
    },
    snapshot,
  };
};

/**
 * Feeds one line of the progress stream into the reducer. A snapshot is produced only
 * when the line closes a frame (`progress=continue` or `progress=end`).
 */
export const reduceProgressLine = (
  state: ProgressParserState,
  line: string,
  durationMs?: number,
): ProgressStep => {
  if (state.finished) {
    return { state };
  }
  const trimmed = line.trim();
  const separator = trimmed.indexOf('=');
  if (separator <= 0) {
    return { state };
  }
  const key = trimmed.slice(0, separator).trim();
  const value = trimmed.slice(separator + 1).trim();
  if (!value) {
    return { state };
  }

  if (key === SENTINEL_KEY) {
    if (value !== 'continue' && value !== 'end') {
      return { state };
    }
    return commitFrame(state, value, durationMs);
  }

  return { state: { ...state, pending: { ...state.pending, [key]: value } } };
};

/**
 * Stateful wrapper around the reducer: one instance per job, fed line by line.
 */
export class ProgressParser {
  private state: ProgressParserState = initialProgressState();

  constructor(private readonly durationMs?: number) {}

  get finished(): boolean {
    return this.state.finished;
  }

  push(line: string): ProgressSnapshot | undefined {
    const step = reduceProgressLine(this.state, line, this.durationMs);
    this.state = step.state;
    return step.snapshot;
  }

  reset(): void {
    this.state = initialProgressState();
  }
}

/**
 * Lazily decodes snapshots from a finite sequence of lines, stopping at `progress=end`.
 */
export function* parseProgressLines(lines: Iterable<string>, durationMs?: number): Generator<ProgressSnapshot> {
  const parser = new ProgressParser(durationMs);
  for (const line of lines) {
    const snapshot = parser.push(line);
    if (snapshot) {
      yield snapshot;
    }
    if (parser.finished) {
      return;
    }
  }
}

/**
 * Async counterpart of {@link parseProgressLines} for line streams such as `readline`.
 */
export async function* parseProgressStream(
  lines: AsyncIterable<string>,
  durationMs?: number,
): AsyncGenerator<ProgressSnapshot> {
  const parser = new ProgressParser(durationMs);
  for await (const line of lines) {
    const snapshot = parser.push(line);
    if (snapshot) {
      yield snapshot;
    }
    if (parser.finished) {
      return;
    }
  }
}
