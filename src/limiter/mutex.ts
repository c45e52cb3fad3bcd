/**
 * Async Mutex
 *
 * FIFO lock for critical sections that span await points. Ownership is
 * handed straight to the oldest waiter on release, so a newly arriving
 * caller can never barge ahead of one already queued.
 */

import { CancelledError } from '../errors/index.js';

type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

export class Mutex {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  /** Number of callers queued behind the current holder */
  get pending(): number {
    return this.waiters.length;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Resolves with a release function once the caller owns the lock.
   * If the signal aborts while queued, the caller leaves the queue and
   * the promise rejects with CancelledError.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Cancelled before acquiring lock'));
    }
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new CancelledError('Cancelled while waiting for lock'));
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        }
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Runs fn while holding the lock; the lock is released even if fn throws
   */
  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.grant(this.releaser());
      } else {
        this.locked = false;
      }
    };
  }
}
