import type { CaptureRecord } from './types';

export const CAPTURE_LOG_CAPACITY = 50;

/**
 * Newest-first list of captures, never longer than its capacity.
 * Index 0 is the most recent record.
 */
export class BoundedLog<T = CaptureRecord> {
  private entries: T[] = [];
  readonly capacity: number;

  constructor(capacity: number = CAPTURE_LOG_CAPACITY) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  prepend(entry: T): void {
    this.entries.unshift(entry);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  snapshot(): readonly T[] {
    return Object.freeze([...this.entries]);
  }
}
