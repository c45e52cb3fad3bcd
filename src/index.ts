/**
 * riot-api-dispatcher
 *
 * Rate-limited, cached client for the League of Legends web API: a
 * multi-window token-bucket limiter, a TTL response cache, and a dispatcher
 * that retries throttled calls on the server's Retry-After.
 */

export { TokenBucket, type BucketSnapshot } from './limiter/tokenBucket.js';
export { MultiWindowLimiter } from './limiter/multiWindowLimiter.js';
export { Mutex } from './limiter/mutex.js';
export { rateWindow, parseRateLimits, type RateWindow } from './limiter/rateWindow.js';
export { ResponseCache } from './cache/responseCache.js';
export { KEYS } from './cache/keys.js';
export {
  RequestDispatcher,
  type DispatcherOptions,
  type DispatcherStats,
  type PendingRequest
} from './http/dispatcher.js';
export * from './http/riotApiClient.js';
export { httpRequest, parseRetryAfter, type HttpRequest, type HttpResponse, type Transport } from './util/http.js';
export { RiotApiService, type MatchIdsOptions } from './services/riotApiService.js';
export { createRiotApi, type RiotApiStack } from './services/app.js';
export * from './errors/index.js';
export * from './types/api.js';
