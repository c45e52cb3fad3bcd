/**
 * Token Bucket
 *
 * Bounds the call rate for exactly one window. Holds up to `capacity`
 * tokens; one token is consumed per admission and tokens come back at
 * `capacity` per `durationMs`.
 *
 * Refill happens lazily on every check, there is no timer:
 * - a full window (or more) since the last refill tops the bucket up;
 * - otherwise whole tokens earned so far are added, and `lastRefill`
 *   advances only by the time those tokens account for, so partial
 *   progress toward the next token carries over to the next check.
 *
 * An elapsed time landing exactly on a token boundary earns that token;
 * landing exactly on the window boundary refills completely.
 */

import { ValidationError } from '../errors/index.js';
import { Mutex } from './mutex.js';
import { rateWindow, type RateWindow } from './rateWindow.js';
import { delay } from '../util/delay.js';

export interface BucketSnapshot {
  durationMs: number;
  capacity: number;
  tokens: number;
  pausedUntil: number;
}

export class TokenBucket {
  readonly window: RateWindow;
  private tokens: number;
  private lastRefill: number;
  private pausedUntil = 0;
  private readonly lock = new Mutex();

  /**
   * @throws ConfigurationError for a non-positive capacity or duration
   */
  constructor(durationMs: number, capacity: number) {
    this.window = rateWindow(durationMs, capacity);
    this.tokens = capacity;
    this.lastRefill = Date.now();
  }

  /** Milliseconds of elapsed time that earn one token */
  private get refillUnitMs(): number {
    return this.window.durationMs / this.window.capacity;
  }

  /**
   * Waits until a token is available and takes it.
   * Check and decrement run inside the bucket's own lock.
   *
   * @throws CancelledError if the signal aborts while waiting
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    await this.lock.runExclusive(async () => {
      for (;;) {
        const now = Date.now();
        if (now < this.pausedUntil) {
          await delay(this.pausedUntil - now, signal);
          continue;
        }
        this.refill(now);
        if (this.tokens > 0) {
          this.tokens -= 1;
          return;
        }
        await delay(this.msUntilNextToken(now), signal);
      }
    }, signal);
  }

  /**
   * Empties the bucket and blocks admission for `durationMs`.
   * `lastRefill` is left alone: time spent paused counts toward refill,
   * so admission resumes the moment the pause ends.
   *
   * @throws ValidationError for a negative or non-finite duration
   */
  pause(durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new ValidationError(`Invalid pause duration: ${durationMs}`, 'durationMs');
    }
    const until = Date.now() + durationMs;
    // A shorter pause never cuts a longer one short
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
    }
    this.tokens = 0;
  }

  /**
   * Gives back one token taken by an admission that was abandoned
   */
  refund(): void {
    if (Date.now() < this.pausedUntil) return;
    this.tokens = Math.min(this.window.capacity, this.tokens + 1);
  }

  snapshot(): BucketSnapshot {
    const now = Date.now();
    if (now >= this.pausedUntil) this.refill(now);
    return {
      durationMs: this.window.durationMs,
      capacity: this.window.capacity,
      tokens: this.tokens,
      pausedUntil: this.pausedUntil
    };
  }

  private refill(now: number): void {
    const { durationMs, capacity } = this.window;
    const elapsed = now - this.lastRefill;
    if (elapsed >= durationMs) {
      this.tokens = capacity;
      this.lastRefill = now;
      return;
    }
    const earned = Math.floor((elapsed * capacity) / durationMs);
    if (earned > 0) {
      this.tokens = Math.min(capacity, this.tokens + earned);
      this.lastRefill += (earned * durationMs) / capacity;
    }
  }

  private msUntilNextToken(now: number): number {
    return Math.max(1, Math.ceil(this.lastRefill + this.refillUnitMs - now));
  }
}
