/**
 * Abortable sleep
 */

import { CancelledError } from '../errors/index.js';

/**
 * Resolves after `ms` milliseconds, or rejects with CancelledError as soon as
 * the signal aborts. The timer is cleared on abort so nothing is left pending.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('Cancelled before wait'));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Cancelled during wait'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles like `promise`, except that it rejects with CancelledError as soon
 * as the signal aborts. The underlying work is not stopped.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new CancelledError('Cancelled before wait'));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError('Cancelled during wait'));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
