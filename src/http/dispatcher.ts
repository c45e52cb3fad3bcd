/**
 * Request Dispatcher
 *
 * Performs one logical upstream call end to end:
 *
 *   cache lookup → limiter admission → send → classify
 *     2xx  → validate body, populate cache, return
 *     429  → pause the limiter for Retry-After (default 1s), send the same request again
 *     404  → NotFoundError
 *     401/403 → UnauthorizedError
 *     else → UnclassifiedApiError
 *
 * Retries after a 429 are unbounded in number; the server's cool-down is
 * the only backoff. Nothing but a validated 2xx body is ever written to
 * the cache, and a failed call never takes a stray token from the limiter.
 * Every caller gets its own copy of the body, so mutating a result never
 * changes what later cache hits return.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../core/logger.js';
import { THROTTLING } from '../core/constants.js';
import {
  CancelledError,
  ConfigurationError,
  NotFoundError,
  ResponseValidationError,
  UnauthorizedError,
  UnclassifiedApiError
} from '../errors/index.js';
import type { MultiWindowLimiter } from '../limiter/multiWindowLimiter.js';
import type { ResponseCache } from '../cache/responseCache.js';
import { abortable, delay } from '../util/delay.js';
import { httpRequest, type HttpRequest, type HttpResponse, type Transport } from '../util/http.js';

/**
 * One logical call
 *
 * @template T - Shape of the validated response body
 */
export interface PendingRequest<T> {
  url: string;
  /** Validates and types the 2xx body */
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Cache key encoding every parameter that affects the result; omit to skip caching */
  cacheKey?: string;
  /** Required with cacheKey */
  ttlSeconds?: number;
  /** Pass through the shared limiter (default true). The static CDN is not rate limited. */
  rateLimited?: boolean;
  /** Send the API key header (default true) */
  authenticated?: boolean;
}

export interface DispatcherOptions {
  limiter: MultiWindowLimiter;
  cache: ResponseCache;
  apiKey: string;
  /** Header carrying the API key */
  tokenHeader?: string;
  transport?: Transport;
  /** Cool-down used when a 429 has no usable Retry-After */
  defaultRetryAfterSeconds?: number;
  /** Let concurrent misses on the same cache key share one upstream call */
  dedupeInFlight?: boolean;
  timeoutMs?: number;
}

/**
 * Counters for diagnostics
 */
export interface DispatcherStats {
  cacheHits: number;
  upstreamCalls: number;
  throttled: number;
  failures: number;
}

type Outcome =
  | { kind: 'success'; data: unknown }
  | { kind: 'throttled'; retryAfterSeconds: number }
  | { kind: 'failure'; error: Error };

export class RequestDispatcher {
  private readonly limiter: MultiWindowLimiter;
  private readonly cache: ResponseCache;
  private readonly apiKey: string;
  private readonly tokenHeader: string;
  private readonly transport: Transport;
  private readonly defaultRetryAfterSeconds: number;
  private readonly dedupeInFlight: boolean;
  private readonly timeoutMs?: number;
  private readonly inFlight = new Map<string, Promise<unknown>>();
  private readonly counters: DispatcherStats = { cacheHits: 0, upstreamCalls: 0, throttled: 0, failures: 0 };

  constructor(options: DispatcherOptions) {
    this.limiter = options.limiter;
    this.cache = options.cache;
    this.apiKey = options.apiKey;
    this.tokenHeader = options.tokenHeader ?? 'X-Riot-Token';
    this.transport = options.transport ?? httpRequest;
    this.defaultRetryAfterSeconds = options.defaultRetryAfterSeconds ?? THROTTLING.DEFAULT_RETRY_AFTER_SECONDS;
    if (!Number.isFinite(this.defaultRetryAfterSeconds) || this.defaultRetryAfterSeconds < 0) {
      throw new ConfigurationError(
        `Invalid default Retry-After: ${this.defaultRetryAfterSeconds}`,
        'defaultRetryAfterSeconds'
      );
    }
    this.dedupeInFlight = options.dedupeInFlight ?? false;
    this.timeoutMs = options.timeoutMs;
  }

  get stats(): Readonly<DispatcherStats> {
    return { ...this.counters };
  }

  /**
   * Runs one logical call
   *
   * @param request - What to fetch and how to cache it
   * @param signal - Abandons the call while it waits on the limiter, a cool-down or the network
   * @returns The validated body, from cache or upstream
   * @throws NotFoundError, UnauthorizedError, UnclassifiedApiError, TransportError,
   *   ResponseValidationError, CancelledError
   */
  async call<T>(request: PendingRequest<T>, signal?: AbortSignal): Promise<T> {
    const { cacheKey } = request;
    if (cacheKey !== undefined) {
      const hit = this.cache.get(cacheKey);
      if (hit !== undefined) {
        this.counters.cacheHits++;
        logger.debug({ cacheKey }, 'cache hit');
        return this.copyOf(request, hit);
      }
    }

    if (cacheKey === undefined || !this.dedupeInFlight) {
      return this.fetchWithRetry(request, signal);
    }

    const pending = this.inFlight.get(cacheKey);
    if (pending) {
      logger.debug({ cacheKey }, 'joining in-flight request');
      try {
        return this.copyOf(request, await abortable(pending, signal));
      } catch (err) {
        // The caller that started the exchange gave up; start over under our own signal
        if (err instanceof CancelledError && !signal?.aborted) {
          return this.call(request, signal);
        }
        throw err;
      }
    }

    // The entry is gone before anyone awaiting the exchange resumes
    const exchange: Promise<T> = this.fetchWithRetry(request, signal).finally(() => {
      this.inFlight.delete(cacheKey);
    });
    this.inFlight.set(cacheKey, exchange);
    return exchange;
  }

  private async fetchWithRetry<T>(request: PendingRequest<T>, signal?: AbortSignal): Promise<T> {
    const rateLimited = request.rateLimited ?? true;
    const httpReq: HttpRequest = {
      method: 'GET',
      url: request.url,
      headers: (request.authenticated ?? true) ? { [this.tokenHeader]: this.apiKey } : {},
      timeoutMs: this.timeoutMs,
      signal
    };

    for (;;) {
      if (rateLimited) {
        await this.limiter.waitForPermission(signal);
      }

      logger.debug({ url: request.url }, 'sending request');
      this.counters.upstreamCalls++;
      const res = await this.transport(httpReq);
      const outcome = this.classify(request.url, res);

      if (outcome.kind === 'success') {
        const value = this.validate(request, outcome.data);
        if (request.cacheKey !== undefined && request.ttlSeconds !== undefined) {
          this.cache.set(request.cacheKey, structuredClone(value), request.ttlSeconds);
        }
        return value;
      }

      if (outcome.kind === 'failure') {
        this.counters.failures++;
        logger.warn({ url: request.url, status: res.status, err: outcome.error }, 'request failed');
        throw outcome.error;
      }

      this.counters.throttled++;
      logger.warn({ url: request.url, retryAfterSeconds: outcome.retryAfterSeconds }, 'throttled, retrying');
      if (rateLimited) {
        this.limiter.reportThrottled(outcome.retryAfterSeconds);
      } else {
        await delay(outcome.retryAfterSeconds * 1000, signal);
      }
    }
  }

  private classify(url: string, res: HttpResponse): Outcome {
    const { status } = res;
    if (status >= 200 && status < 300) {
      return { kind: 'success', data: res.data };
    }
    switch (status) {
      case 429:
        return { kind: 'throttled', retryAfterSeconds: res.retryAfterSeconds ?? this.defaultRetryAfterSeconds };
      case 404:
        return { kind: 'failure', error: new NotFoundError(url) };
      case 401:
      case 403:
        return { kind: 'failure', error: new UnauthorizedError(url, status === 401 ? 401 : 403) };
      default:
        return { kind: 'failure', error: new UnclassifiedApiError(url, status, res.body) };
    }
  }

  /** A private copy for one caller; nothing handed out aliases the cache */
  private copyOf<T>(request: PendingRequest<T>, value: unknown): T {
    return this.validate(request, structuredClone(value));
  }

  private validate<T>(request: PendingRequest<T>, data: unknown): T {
    const parsed = request.schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ResponseValidationError(request.url, issues, parsed.error);
    }
    return parsed.data;
  }
}
