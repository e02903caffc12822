// Async coordination primitives.

/**
 * FIFO async mutex.
 *
 * Guards critical sections that span awaits, such as writing a whole message
 * to a shared stream.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  isLocked(): boolean {
    return this.locked;
  }

  /** Acquire the lock. Resolves with the function that releases it. */
  lock(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.lock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      // Hand the lock straight to the next waiter, if any
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * Tracks in-flight tasks so a caller can wait for all of them to settle.
 */
export class WaitGroup {
  private pending = 0;
  private waiters: Array<() => void> = [];

  get size(): number {
    return this.pending;
  }

  /** Track a task. Its outcome is not observed here. */
  track(task: Promise<unknown>): void {
    this.pending++;
    const settle = () => {
      this.pending--;
      if (this.pending === 0) {
        const waiters = this.waiters;
        this.waiters = [];
        for (const wake of waiters) wake();
      }
    };
    void task.then(settle, settle);
  }

  /** Resolves once every tracked task has settled. */
  wait(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
