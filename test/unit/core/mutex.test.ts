import { describe, it, expect } from 'vitest';
import { AsyncMutex, AsyncSemaphore } from '../../../src/core/mutex.js';

describe('AsyncMutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = new AsyncMutex();
    expect(mutex.isLocked).toBe(false);

    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('should queue concurrent acquire calls', async () => {
    const mutex = new AsyncMutex();
    const order: number[] = [];

    const p1 = mutex.acquire().then(release => {
      order.push(1);
      setTimeout(release, 10);
    });

    const p2 = mutex.acquire().then(release => {
      order.push(2);
      release();
    });

    const p3 = mutex.acquire().then(release => {
      order.push(3);
      release();
    });

    await Promise.all([p1, p2, p3]);
    expect(order).toEqual([1, 2, 3]);
  });

  it('should serialize runExclusive callers', async () => {
    const mutex = new AsyncMutex();
    const log: string[] = [];
    const job = (name: string) => async () => {
      log.push(`${name}:start`);
      await new Promise(r => setTimeout(r, 5));
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.runExclusive(job('a')), mutex.runExclusive(job('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should release lock even on error in runExclusive', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.runExclusive(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(mutex.isLocked).toBe(false);
  });

  it('should report queue length', async () => {
    const mutex = new AsyncMutex();
    expect(mutex.queueLength).toBe(0);

    const release = await mutex.acquire();
    const p1 = mutex.acquire();
    const p2 = mutex.acquire();

    await new Promise(r => setTimeout(r, 0));
    expect(mutex.queueLength).toBe(2);

    release();
    const r1 = await p1;
    r1();
    const r2 = await p2;
    r2();
    expect(mutex.isLocked).toBe(false);
  });

  it('should handle idempotent release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    release();
    release();
    expect(mutex.isLocked).toBe(false);
  });
});

describe('AsyncSemaphore', () => {
  it('should allow up to maxPermits concurrent access', async () => {
    const sem = new AsyncSemaphore(3);
    expect(sem.available).toBe(3);
    expect(sem.max).toBe(3);

    const r1 = await sem.acquire();
    const r2 = await sem.acquire();
    const r3 = await sem.acquire();
    expect(sem.available).toBe(0);

    r1();
    expect(sem.available).toBe(1);
    r2();
    r3();
    expect(sem.available).toBe(3);
  });

  it('should queue when permits exhausted', async () => {
    const sem = new AsyncSemaphore(1);
    const order: number[] = [];

    const r1 = await sem.acquire();
    order.push(1);

    const p2 = sem.acquire().then(release => {
      order.push(2);
      release();
    });

    await new Promise(r => setTimeout(r, 5));
    expect(order).toEqual([1]);

    r1();
    await p2;
    expect(order).toEqual([1, 2]);
  });

  it('should release the permit when withPermit throws', async () => {
    const sem = new AsyncSemaphore(1);
    await expect(sem.withPermit(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(sem.available).toBe(1);
  });

  it('should reject fewer than one permit', () => {
    expect(() => new AsyncSemaphore(0)).toThrow(RangeError);
  });
});
