/**
 * Timeout utility for wrapping async operations with time limits.
 */

import { SHUTDOWN_TIMEOUT_MS } from "../config/index.js";

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Wrap a promise with a timeout.
 * Rejects with TimeoutError if the promise doesn't resolve within the specified time.
 *
 * @param ms - Timeout in milliseconds (defaults to SHUTDOWN_TIMEOUT_MS)
 * @throws TimeoutError if the timeout is exceeded
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number = SHUTDOWN_TIMEOUT_MS,
  errorMessage = "Operation timed out"
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(`${errorMessage} after ${ms}ms`, ms));
    }, ms);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    clearTimeout(timeoutId);
  });
}

/**
 * Resolve after `ms` milliseconds, or immediately once `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
