type Waiter = () => void;

/**
 * FIFO mutex for a single event loop. `release` hands ownership straight to
 * the next waiter, so `isIdle` is only true when nobody holds the lock and
 * nobody is queued for it.
 */
export class AsyncLock {
  private held: boolean;
  private readonly waiters: Waiter[];

  constructor() {
    this.held = false;
    this.waiters = [];
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const grant: Waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    if (!this.held) {
      throw new Error('AsyncLock released while not held');
    }

    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    this.held = false;
  }

  async runExclusive<T>(
    task: () => T | Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.held;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  get isIdle(): boolean {
    return !this.held && this.waiters.length === 0;
  }
}
