import { describe, it, expect, vi } from 'vitest';
import { Semaphore, KeyedLock } from '../../src/utils/semaphore.js';

// Mock the logger
vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

describe('Semaphore', () => {
  describe('constructor', () => {
    it('should create semaphore with max permits', () => {
      const sem = new Semaphore('test', 3);
      const state = sem.getState();
      expect(state.available).toBe(3);
      expect(state.maxPermits).toBe(3);
      expect(state.queued).toBe(0);
      expect(sem.isIdle).toBe(true);
    });
  });

  describe('acquire', () => {
    it('should acquire permit when available', async () => {
      const sem = new Semaphore('test', 2);
      await sem.acquire();
      expect(sem.getState().available).toBe(1);
      expect(sem.isIdle).toBe(false);
    });

    it('should wait when no permits available', async () => {
      const sem = new Semaphore('test', 1);
      await sem.acquire();

      let acquired = false;
      const acquirePromise = sem.acquire().then(() => {
        acquired = true;
      });

      expect(acquired).toBe(false);
      expect(sem.getState().queued).toBe(1);

      sem.release();

      await acquirePromise;
      expect(acquired).toBe(true);
    });

    it('should serve waiters in FIFO order', async () => {
      const sem = new Semaphore('test', 1);
      await sem.acquire();

      const results: number[] = [];
      const promise1 = sem.acquire().then(() => results.push(1));
      const promise2 = sem.acquire().then(() => results.push(2));

      sem.release();
      await promise1;
      sem.release();
      await promise2;

      expect(results).toEqual([1, 2]);
    });
  });

  describe('tryAcquire', () => {
    it('should return true and acquire when available', () => {
      const sem = new Semaphore('test', 2);
      expect(sem.tryAcquire()).toBe(true);
      expect(sem.getState().available).toBe(1);
    });

    it('should return false when no permits available', async () => {
      const sem = new Semaphore('test', 1);
      await sem.acquire();
      expect(sem.tryAcquire()).toBe(false);
    });
  });

  describe('release', () => {
    it('should hand the permit to a waiter instead of the pool', async () => {
      const sem = new Semaphore('test', 1);
      await sem.acquire();
      const waiting = sem.acquire();

      sem.release();
      await waiting;

      expect(sem.getState().available).toBe(0);
    });

    it('should not exceed max permits', () => {
      const sem = new Semaphore('test', 2);
      sem.release();
      sem.release();
      expect(sem.getState().available).toBe(2);
    });
  });

  describe('execute', () => {
    it('should return the function result and release', async () => {
      const sem = new Semaphore('test', 1);
      const result = await sem.execute(async () => 'done');

      expect(result).toBe('done');
      expect(sem.isIdle).toBe(true);
    });

    it('should release the permit when the function throws', async () => {
      const sem = new Semaphore('test', 1);

      await expect(sem.execute(async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect(sem.getState().available).toBe(1);
    });

    it('should never run more functions than permits at once', async () => {
      const sem = new Semaphore('test', 2);
      let running = 0;
      let peak = 0;

      const work = async (): Promise<void> => {
        running++;
        peak = Math.max(peak, running);
        await new Promise(resolve => setTimeout(resolve, 5));
        running--;
      };

      await Promise.all([1, 2, 3, 4, 5].map(() => sem.execute(work)));

      expect(peak).toBe(2);
      expect(sem.isIdle).toBe(true);
    });
  });
});

describe('KeyedLock', () => {
  it('should serialize work on the same key', async () => {
    const lock = new KeyedLock('test');
    const order: string[] = [];

    const first = lock.run('TASK-001', async () => {
      order.push('first:start');
      await new Promise(resolve => setTimeout(resolve, 10));
      order.push('first:end');
    });
    const second = lock.run('TASK-001', async () => {
      order.push('second');
    });

    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let different keys proceed independently', async () => {
    const lock = new KeyedLock('test');
    const order: string[] = [];

    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = lock.run('a', async () => {
      await gate;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });
    releaseFirst();
    await first;

    expect(order).toEqual(['b', 'a']);
  });

  it('should report locked keys and drop idle ones', async () => {
    const lock = new KeyedLock('test');
    let observed = false;

    await lock.run('a', async () => {
      observed = lock.isLocked('a');
    });

    expect(observed).toBe(true);
    expect(lock.isLocked('a')).toBe(false);
    expect(lock.size).toBe(0);
  });

  it('should release the key when the function throws', async () => {
    const lock = new KeyedLock('test');

    await expect(lock.run('a', async () => {
      throw new Error('fail');
    })).rejects.toThrow('fail');

    expect(lock.size).toBe(0);
    await expect(lock.run('a', async () => 42)).resolves.toBe(42);
  });
});
