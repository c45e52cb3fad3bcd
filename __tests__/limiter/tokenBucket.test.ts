import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { TokenBucket } from '../../src/limiter/tokenBucket.js';
import { CancelledError, ConfigurationError, ValidationError } from '../../src/errors/index.js';

const T0 = new Date('2026-01-01T00:00:00Z');

async function drain(bucket: TokenBucket, n: number): Promise<void> {
  for (let i = 0; i < n; i++) {
    await bucket.acquire();
  }
}

describe('TokenBucket', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fail fast on a non-positive capacity', () => {
    expect(() => new TokenBucket(1000, 0)).toThrow(ConfigurationError);
    expect(() => new TokenBucket(1000, -1)).toThrow(ConfigurationError);
  });

  it('should grant capacity tokens at once, then suspend until one refill unit elapses', async () => {
    const bucket = new TokenBucket(1000, 5);
    await drain(bucket, 5);
    expect(bucket.snapshot().tokens).toBe(0);

    let granted = false;
    const next = bucket.acquire().then(() => { granted = true; });

    await vi.advanceTimersByTimeAsync(199);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await next;
    expect(granted).toBe(true);
    expect(Date.now() - T0.getTime()).toBe(200);
  });

  it('should keep fractional refill progress between checks', async () => {
    const bucket = new TokenBucket(1000, 10);
    await drain(bucket, 10);

    vi.advanceTimersByTime(150);
    expect(bucket.snapshot().tokens).toBe(1);

    // 100ms of the first 150 earned a token; the other 50 carry over
    vi.advanceTimersByTime(50);
    expect(bucket.snapshot().tokens).toBe(2);
  });

  it('should refill completely once a whole window has elapsed', async () => {
    const bucket = new TokenBucket(1000, 10);
    await drain(bucket, 10);

    vi.advanceTimersByTime(1000);
    expect(bucket.snapshot().tokens).toBe(10);
  });

  it('should never exceed capacity', () => {
    const bucket = new TokenBucket(1000, 10);
    vi.advanceTimersByTime(500);
    expect(bucket.snapshot().tokens).toBe(10);
  });

  it('should hold tokens at zero while paused and admit as soon as the pause ends', async () => {
    const bucket = new TokenBucket(1000, 5);
    bucket.pause(3000);

    let granted = false;
    const next = bucket.acquire().then(() => { granted = true; });

    await vi.advanceTimersByTimeAsync(1000);
    expect(bucket.snapshot().tokens).toBe(0);

    await vi.advanceTimersByTimeAsync(1999);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await next;
    expect(Date.now() - T0.getTime()).toBe(3000);
    // Three seconds since the last refill: a whole window, so the bucket came back full
    expect(bucket.snapshot().tokens).toBe(4);
  });

  it('should count time spent paused toward a partial refill', async () => {
    const bucket = new TokenBucket(120000, 100);
    await drain(bucket, 100);

    bucket.pause(5000);
    await vi.advanceTimersByTimeAsync(5000);

    // 5000ms at 1200ms per token
    expect(bucket.snapshot().tokens).toBe(4);
  });

  it('should reject a pause that is not a finite, non-negative duration', async () => {
    const bucket = new TokenBucket(1000, 5);
    await drain(bucket, 5);

    expect(() => bucket.pause(Number.NaN)).toThrow(ValidationError);
    expect(() => bucket.pause(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
    expect(() => bucket.pause(-1)).toThrow(ValidationError);
    expect(bucket.snapshot()).toEqual({ durationMs: 1000, capacity: 5, tokens: 0, pausedUntil: 0 });
  });

  it('should not let a shorter pause cut a longer one short', () => {
    const bucket = new TokenBucket(1000, 5);
    bucket.pause(5000);
    bucket.pause(1000);
    expect(bucket.snapshot().pausedUntil).toBe(T0.getTime() + 5000);
  });

  it('should stop waiting when the signal aborts and stay usable', async () => {
    const bucket = new TokenBucket(1000, 5);
    await drain(bucket, 5);
    const controller = new AbortController();

    const waiting = bucket.acquire(controller.signal);
    const rejected = expect(waiting).rejects.toBeInstanceOf(CancelledError);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await rejected;

    const next = bucket.acquire();
    await vi.advanceTimersByTimeAsync(100);
    await expect(next).resolves.toBeUndefined();
    expect(Date.now() - T0.getTime()).toBe(200);
  });

  it('should return a refunded token unless paused', async () => {
    const bucket = new TokenBucket(1000, 5);
    await drain(bucket, 5);

    bucket.refund();
    expect(bucket.snapshot().tokens).toBe(1);

    bucket.pause(1000);
    bucket.refund();
    expect(bucket.snapshot().tokens).toBe(0);
  });
});
