import { describe, it, expect } from 'vitest';
import { AsyncMutex } from '../../../src/core/mutex.js';

describe('AsyncMutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = new AsyncMutex();

    const release = await mutex.acquire();
    release();

    // Free again: the next acquire resolves without waiting on anyone
    const again = await mutex.acquire();
    again();
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

  it('should support withLock helper', async () => {
    const mutex = new AsyncMutex();
    const result = await mutex.withLock(() => 42);
    expect(result).toBe(42);
  });

  it('should release lock even on error in withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(await mutex.withLock(() => 'after')).toBe('after');
  });

  it('should stay locked while handing over to the next waiter', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];
    const release = await mutex.acquire();
    const next = mutex.acquire().then(r => {
      order.push('next');
      return r;
    });

    release();
    // Arrives after the handoff started; must still queue behind `next`
    const late = mutex.acquire().then(r => {
      order.push('late');
      r();
    });

    const releaseNext = await next;
    releaseNext();
    await late;
    expect(order).toEqual(['next', 'late']);
  });

  it('should handle idempotent release', async () => {
    const mutex = new AsyncMutex();
    const order: number[] = [];
    const release = await mutex.acquire();
    const second = mutex.acquire().then(r => {
      order.push(2);
      return r;
    });
    const third = mutex.acquire().then(r => {
      order.push(3);
      r();
    });

    release();
    release(); // Double release must not wake the third waiter early
    const releaseSecond = await second;
    expect(order).toEqual([2]);
    releaseSecond();
    await third;
    expect(order).toEqual([2, 3]);
  });
});
