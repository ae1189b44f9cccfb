/**
 * Bounded-concurrency gates
 */

/**
 * Counting semaphore. At most `limit` tasks run inside {@link Gate.run}
 * at once; the rest wait in FIFO order.
 */
export class Gate {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Gate limit must be a positive integer, got ${limit}`);
    }
  }

  /** Tasks currently holding a slot */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }

  /**
   * Run `task` once a slot is free. The slot is released when the task
   * settles, whether it resolves or rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Mutual exclusion: a gate of one.
 */
export class Mutex extends Gate {
  constructor() {
    super(1);
  }
}
