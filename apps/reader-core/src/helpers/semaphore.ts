/**
 * Semaphore for serializing async work.
 * Waiters are woken in FIFO order; there is no busy-wait.
 */
export class Semaphore {
  private permits: number;
  private waitQueue: Array<() => void> = [];

  constructor(maxPermits = 1) {
    this.permits = maxPermits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  release(): void {
    // Hand the permit straight to the next waiter
    const waiter = this.waitQueue.shift();
    if (waiter) {
      waiter();
    } else {
      this.permits++;
    }
  }

  /**
   * Run a task while holding a permit. The permit is released even if the task throws.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }
}
