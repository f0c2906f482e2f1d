/**
 * Async locking primitives.
 * - AsyncMutex: serializes evolution cycles
 * - AsyncSemaphore: bounds concurrent capability calls inside a run
 */

type Waiter = () => void;

/**
 * Exclusive lock. Waiters are served FIFO.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Waiter[] = [];

  /**
   * Acquire the lock. Resolves to an idempotent release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }
    return new Promise<() => void>(resolve => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // lock passes straight to the next waiter
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * Counting semaphore for bounded concurrency.
 */
export class AsyncSemaphore {
  private permits: number;
  private waiters: Waiter[] = [];

  constructor(private readonly maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least 1 permit, got ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }
    return new Promise<() => void>(resolve => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /**
   * Run `fn` while holding one permit.
   */
  async withPermit<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get max(): number {
    return this.maxPermits;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.permits++;
      }
    };
  }
}
