/**
 * =============================================================================
 * RETRY WITH EXPONENTIAL BACKOFF
 * =============================================================================
 *
 * Retries transient failures of outbound calls.
 *
 * Delay before retry n (n = 1, 2, ...) is `min(maxDelayMs, baseDelayMs * 2^(n-1))`.
 * With the defaults (2000 / 10000, 3 attempts) that is 2s then 4s.
 *
 * USAGE:
 * ```typescript
 * const data = await retryWithBackoff(() => fetchMatrix(url), {
 *   attempts: 3,
 *   shouldRetry: (error) => error instanceof RoutingTimeoutError,
 * });
 * ```
 * =============================================================================
 */

import { setTimeout as sleepMs } from 'node:timers/promises';

export interface RetryOptions {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Decide whether a failure is transient. Non-retryable errors are rethrown at once. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_BASE_DELAY_MS = 2000;
const DEFAULT_MAX_DELAY_MS = 10000;

export function backoffDelay(retryNumber: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, retryNumber - 1));
}

const defaultSleep = async (ms: number): Promise<void> => {
  await sleepMs(ms);
};

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
