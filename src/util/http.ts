/**
 * HTTP Utility Module
 *
 * One request/response exchange over axios. HTTP error statuses are
 * returned, not thrown (validateStatus: () => true), so the dispatcher can
 * classify them; only network-level failures throw.
 */

import axios from 'axios';
import { CancelledError, TransportError } from '../errors/index.js';
import { logger } from '../core/logger.js';

export interface HttpRequest {
  method: 'GET';
  url: string;
  headers: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * HTTP response structure
 */
export interface HttpResponse {
  status: number; // HTTP status code
  data: unknown; // Response body (parsed as JSON when possible)
  body: string; // Response body as text, for error reports
  retryAfterSeconds?: number; // Retry-After header value in seconds, when present and parsable
}

/**
 * A single request/response exchange. Swappable so tests can run without a network.
 */
export type Transport = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Parses a Retry-After header
 *
 * Accepts delta-seconds ("5") or an HTTP-date. Dates in the past give 0.
 *
 * @param value - Raw header value
 * @param now - Reference time for HTTP-date values
 * @returns Seconds to wait, or undefined if absent or unparsable
 *
 * @example
 * parseRetryAfter('5') // 5
 * parseRetryAfter('soon') // undefined
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Performs an HTTP request through axios
 *
 * @returns Status, parsed body, raw body and Retry-After
 * @throws CancelledError if the signal aborted the request
 * @throws TransportError on network failure or timeout
 *
 * @example
 * const res = await httpRequest({
 *   method: 'GET',
 *   url: 'https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-name/Someone',
 *   headers: { 'X-Riot-Token': apiKey }
 * });
 */
export const httpRequest: Transport = async (request) => {
  const { method, url, headers, timeoutMs, signal } = request;
  try {
    const res = await axios.request({
      method,
      url,
      headers,
      timeout: timeoutMs,
      signal,
      validateStatus: () => true
    });

    logger.debug({ url, status: res.status }, 'HTTP response received');

    const retryAfterRaw = res.headers['retry-after'];
    return {
      status: res.status,
      data: res.data,
      body: bodyText(res.data),
      retryAfterSeconds: parseRetryAfter(typeof retryAfterRaw === 'string' ? retryAfterRaw : undefined)
    };
  } catch (err) {
    if (axios.isCancel(err) || signal?.aborted) {
      throw new CancelledError(`Request cancelled: ${url}`);
    }
    const error = err instanceof Error ? err : new Error(String(err));
    throw new TransportError(`HTTP request failed: ${error.message}`, url, error);
  }
};
