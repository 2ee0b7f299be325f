/**
 * Counting admission gate with an explicit join.
 *
 * `acquire()` resolves once a slot is free; waiters are admitted in FIFO
 * order as slots are released. `drain()` resolves when nothing is running
 * and nobody is waiting.
 */
export class BoundedPool {
  readonly maxConcurrency: number;
  private activeCount = 0;
  private peakCount = 0;
  private admissionQueue: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer (got ${maxConcurrency})`);
    }
    this.maxConcurrency = maxConcurrency;
  }

  get active(): number {
    return this.activeCount;
  }

  get peak(): number {
    return this.peakCount;
  }

  get waiting(): number {
    return this.admissionQueue.length;
  }

  acquire(): Promise<void> {
    if (this.activeCount < this.maxConcurrency && this.admissionQueue.length === 0) {
      this.admit();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.admissionQueue.push(() => {
        this.admit();
        resolve();
      });
    });
  }

  release(): void {
    if (this.activeCount === 0) {
      throw new Error('release() called with no active slot');
    }
    this.activeCount--;

    const next = this.admissionQueue.shift();
    if (next) {
      next();
      return;
    }
    if (this.activeCount === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const wake of waiters) wake();
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

  drain(): Promise<void> {
    if (this.activeCount === 0 && this.admissionQueue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private admit(): void {
    this.activeCount++;
    if (this.activeCount > this.peakCount) {
      this.peakCount = this.activeCount;
    }
  }
}
