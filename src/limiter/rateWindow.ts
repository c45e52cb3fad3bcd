/**
 * Rate Window
 *
 * A single (duration, max-calls) constraint. Windows are static
 * configuration: built once at startup and never mutated.
 */

import { ConfigurationError } from '../errors/index.js';

export interface RateWindow {
  /** Window length in milliseconds */
  readonly durationMs: number;
  /** Maximum calls permitted per window */
  readonly capacity: number;
}

/**
 * Builds a validated, frozen window
 *
 * @throws ConfigurationError if capacity is not a positive integer or duration is not positive
 */
export function rateWindow(durationMs: number, capacity: number): RateWindow {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new ConfigurationError(`Rate window capacity must be a positive integer, got ${capacity}`, 'capacity');
  }
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    throw new ConfigurationError(`Rate window duration must be positive, got ${durationMs}ms`, 'durationMs');
  }
  return Object.freeze({ durationMs, capacity });
}

/**
 * Parses a comma-separated list of `seconds:calls` pairs
 *
 * @example
 * parseRateLimits('1:20,120:100')
 * // Returns: [{ durationMs: 1000, capacity: 20 }, { durationMs: 120000, capacity: 100 }]
 */
export function parseRateLimits(limits: string): RateWindow[] {
  const parts = limits.split(',').map(p => p.trim()).filter(Boolean);
  if (parts.length === 0) {
    throw new ConfigurationError('At least one rate window is required', 'RATE_LIMITS');
  }
  return parts.map((part) => {
    const m = part.match(/^(\d+(?:\.\d+)?):(\d+)$/);
    if (!m) {
      throw new ConfigurationError(`Invalid rate window "${part}", expected seconds:calls`, 'RATE_LIMITS');
    }
    return rateWindow(Number(m[1]) * 1000, Number(m[2]));
  });
}
