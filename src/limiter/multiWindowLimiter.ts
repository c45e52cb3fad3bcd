/**
 * Multi-Window Limiter
 *
 * One admission gate over several token buckets, e.g. 20 calls/second and
 * 100 calls/2 minutes at the same time. A caller proceeds only once every
 * bucket has granted a token.
 *
 * The whole pass over the buckets runs inside a single composite lock, so
 * callers are admitted strictly in the order they arrive and no caller can
 * slip in between another caller's per-bucket grants.
 */

import { logger } from '../core/logger.js';
import { ConfigurationError, ValidationError } from '../errors/index.js';
import { Mutex } from './mutex.js';
import { TokenBucket, type BucketSnapshot } from './tokenBucket.js';
import type { RateWindow } from './rateWindow.js';

export class MultiWindowLimiter {
  private readonly buckets: readonly TokenBucket[];
  private readonly gate = new Mutex();

  /**
   * @param windows - Every constraint to enforce; acquired shortest window first
   * @throws ConfigurationError for an empty list, duplicate durations or invalid windows
   */
  constructor(windows: readonly RateWindow[]) {
    if (windows.length === 0) {
      throw new ConfigurationError('At least one rate window is required', 'windows');
    }
    const durations = new Set(windows.map(w => w.durationMs));
    if (durations.size !== windows.length) {
      throw new ConfigurationError('Rate windows must have distinct durations', 'windows');
    }
    this.buckets = [...windows]
      .sort((a, b) => a.durationMs - b.durationMs)
      .map(w => new TokenBucket(w.durationMs, w.capacity));
  }

  /** Callers currently queued behind the one being admitted */
  get waiting(): number {
    return this.gate.pending;
  }

  /**
   * Suspends until every window admits one more call.
   *
   * If the signal aborts midway, tokens already taken in this pass are
   * returned to their buckets before CancelledError propagates.
   */
  async waitForPermission(signal?: AbortSignal): Promise<void> {
    await this.gate.runExclusive(async () => {
      const granted: TokenBucket[] = [];
      try {
        for (const bucket of this.buckets) {
          await bucket.acquire(signal);
          granted.push(bucket);
        }
      } catch (err) {
        for (const bucket of granted) bucket.refund();
        throw err;
      }
    }, signal);
  }

  /**
   * Applies a server-mandated cool-down to every window.
   * Everyone sharing this limiter blocks until it elapses.
   *
   * @throws ValidationError for a negative or non-finite cool-down, before any window is touched
   */
  reportThrottled(retryAfterSeconds: number): void {
    if (!Number.isFinite(retryAfterSeconds) || retryAfterSeconds < 0) {
      throw new ValidationError(`Invalid Retry-After: ${retryAfterSeconds}`, 'retryAfterSeconds');
    }
    const durationMs = retryAfterSeconds * 1000;
    logger.warn({ retryAfterSeconds, waiting: this.gate.pending }, 'upstream throttled, pausing all rate windows');
    for (const bucket of this.buckets) {
      bucket.pause(durationMs);
    }
  }

  snapshot(): BucketSnapshot[] {
    return this.buckets.map(b => b.snapshot());
  }
}
