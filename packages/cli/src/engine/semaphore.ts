interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  timeout?: NodeJS.Timeout;
}

/**
 * Counting semaphore bounding how many generations run at once
 */
export class Semaphore {
  private permits: number;
  private queue: Waiter[] = [];

  constructor(private readonly maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit, waiting in FIFO order when none is free.
   * @param timeoutMs - Give up after this long; waits indefinitely when omitted
   * @throws Error if the timeout is reached
   */
  async acquire(timeoutMs?: number): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (timeoutMs !== undefined) {
        waiter.timeout = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(new Error(`Semaphore acquire timeout after ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.queue.push(waiter);
    });
  }

  /**
   * Release a permit, handing it straight to the next waiter if there is one
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      if (next.timeout) {
        clearTimeout(next.timeout);
      }
      next.resolve();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Run a function with automatic permit acquisition and release
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  getAvailablePermits(): number {
    return this.permits;
  }
}
