// Bounded completion queue for finished calls.

/**
 * A buffered single-consumer queue with a fixed capacity.
 *
 * Similar to a buffered channel: `send` never blocks, and reports false when
 * the buffer is full. Capacity must be at least 1.
 */
export class CompletionQueue<T> {
  private buffer: T[] = [];
  private waiters: Array<(value: T) => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`completion queue capacity must be an integer >= 1, got ${capacity}`);
    }
  }

  /** Number of buffered values. */
  get length(): number {
    return this.buffer.length;
  }

  send(value: T): boolean {
    // If there's a waiter, deliver directly
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }

    return false;
  }

  recv(): Promise<T> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
