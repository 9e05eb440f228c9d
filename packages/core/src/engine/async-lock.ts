// packages/core/src/engine/async-lock.ts

/** Promise-based semaphore. Waiters are served in arrival order. */
export class AsyncSemaphore {
  private queue: Array<() => void> = [];
  private running = 0;

  constructor(private max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) next();
  }

  get inFlight(): number {
    return this.running;
  }
}

/** Exclusive lock around a critical section. */
export class Mutex {
  private semaphore = new AsyncSemaphore(1);

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.semaphore.acquire();
    try {
      return await fn();
    } finally {
      this.semaphore.release();
    }
  }
}
