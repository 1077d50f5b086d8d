import { ConfigurationError } from './errors.js';

/**
 * Fixed-capacity FIFO of the most recent turns, backed by a ring buffer.
 * Appending to a full window overwrites the oldest slot.
 */
export class ContextWindow<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError('Invalid context window', [
        `capacity must be a positive integer, got ${String(capacity)}`,
      ]);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  append(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Oldest to newest. Returns a fresh array on every call. */
  render(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  reset(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
