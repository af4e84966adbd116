/**
 * Bounds how many async tasks run at once. Queued tasks start in FIFO order
 * as running ones settle.
 */
export class ConcurrencyLimiter {
  private queue: Array<() => void> = [];
  private active = 0;

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Runs `task` over every item; results keep the order of `items`. */
  map<I, O>(items: readonly I[], task: (item: I) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map(item => this.run(() => task(item))));
  }

  get running(): number {
    return this.active;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.queue.shift();
    if (next) next();
  }
}
