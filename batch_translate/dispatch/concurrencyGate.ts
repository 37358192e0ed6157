/**
 * Counting semaphore. At most `limit` tasks hold a slot at once; waiters are
 * served in arrival order and a released slot is handed straight to the next
 * waiter.
 */
export class ConcurrencyGate {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot transfers to the waiter; active count is unchanged
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error("ConcurrencyGate.release() called without a matching acquire()");
    }
    this.active--;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
