// src/pool.ts

type Waiter = () => void;

/**
 * Bounded in-process worker pool.
 *
 * - At most `size` tasks run concurrently.
 * - Further tasks wait in a FIFO queue; a finishing task hands its slot
 *   straight to the next waiter.
 */
export class WorkerPool {
  readonly size: number;

  private active = 0;
  private queue: Waiter[] = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`pool size must be > 0 (got ${size})`);
    }
    this.size = size;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Runs `fn` over every item through the pool; results keep input order. */
  map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, i) => this.run(() => fn(item, i))));
  }

  /** Like `map`, but never rejects: each outcome is settled individually. */
  mapSettled<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<PromiseSettledResult<O>[]> {
    return Promise.allSettled(items.map((item, i) => this.run(() => fn(item, i))));
  }

  snapshot(): { active: number; queued: number; size: number } {
    return { active: this.active, queued: this.queue.length, size: this.size };
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.queue.push(resolve));
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // slot passes to the waiter, active stays the same
      next();
      return;
    }
    this.active -= 1;
  }
}
