/**
 * Semaphore and keyed locks for concurrency control
 */

import { logger } from './logger.js';

const log = logger.child('semaphore');

export class Semaphore {
  private permits: number;
  private maxPermits: number;
  private queue: Array<() => void> = [];
  private readonly name: string;

  constructor(name: string, maxPermits: number) {
    this.name = name;
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  /**
   * Acquire a permit
   * Waits if no permits available
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      log.debug('Permit acquired', {
        name: this.name,
        available: this.permits,
        queued: this.queue.length,
      });
      return;
    }

    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
      log.debug('Waiting for permit', {
        name: this.name,
        queued: this.queue.length,
      });
    });
  }

  /**
   * Try to acquire a permit without waiting
   */
  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Execute function with acquired permit.
   * The permit is released on every exit path.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getState(): {
    available: number;
    maxPermits: number;
    queued: number;
  } {
    return {
      available: this.permits,
      maxPermits: this.maxPermits,
      queued: this.queue.length,
    };
  }

  /**
   * Idle means nobody holds a permit and nobody waits for one.
   */
  get isIdle(): boolean {
    return this.permits === this.maxPermits && this.queue.length === 0;
  }
}

/**
 * One mutex per key. A key's semaphore is dropped once nobody holds or
 * waits for it, so the map only ever contains keys in use.
 */
export class KeyedLock {
  private locks: Map<string, Semaphore> = new Map();
  private readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(`${this.name}:${key}`, 1);
      this.locks.set(key, lock);
    }

    try {
      return await lock.execute(fn);
    } finally {
      if (lock.isIdle && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    const lock = this.locks.get(key);
    return lock !== undefined && !lock.isIdle;
  }

  get size(): number {
    return this.locks.size;
  }
}
