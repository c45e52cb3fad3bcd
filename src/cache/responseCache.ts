/**
 * Response Cache
 *
 * In-memory key → (value, expiresAt) store for idempotent, slow-changing
 * upstream data. Expiry is checked when an entry is read; an expired entry
 * is evicted on that read. There is no background sweeper: `purgeExpired`
 * exists for callers that want to reclaim memory explicitly.
 *
 * Every operation is synchronous, so under the event loop concurrent
 * callers cannot interleave inside a get or set. Writes are last-writer-wins.
 */

import { ValidationError } from '../errors/index.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number; // timestamp ms
}

export class ResponseCache<V = unknown> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  /** Entries held, including expired ones not yet read or purged */
  get size(): number {
    return this.entries.size;
  }

  /**
   * @returns The live value, or undefined if never set or expired
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Stores a value for `ttlSeconds`, replacing any previous entry for the key
   */
  set(key: string, value: V, ttlSeconds: number): void {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
      throw new ValidationError(`Invalid cache TTL: ${ttlSeconds}`, 'ttlSeconds');
    }
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Drops every expired entry
   *
   * @returns Number of entries removed
   */
  purgeExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
