export interface LogTail {
  readonly capacity: number;
  readonly size: number;
  push(line: string): void;
  lines(): string[];
  toString(): string;
}

/**
 * Fixed-capacity ring buffer keeping the most recent diagnostic lines of an encoder run.
 */
export const createLogTail = (capacity: number): LogTail => {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new RangeError(`Log tail capacity must be a positive integer, got ${capacity}`);
  }
  const buffer: string[] = [];
  let start = 0;
  const lines = (): string[] => [...buffer.slice(start), ...buffer.slice(0, start)];

  return {
    capacity,
    get size(): number {
      return buffer.length;
    },
    push(line: string): void {
      if (buffer.length < capacity) {
        buffer.push(line);
        return;
      }
      // Full: overwrite the oldest slot and move the head forward.
      buffer[start] = line;
      start = (start + 1) % capacity;
    },
    lines,
    toString: () => lines().join('\n'),
  };
};
