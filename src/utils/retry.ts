/**
 * Retry policy — one backoff loop shared by every retrying call site
 *
 * Extracted from the HTTP client so the signed API client and the
 * HTTP layer apply the same attempt bound and backoff shape.
 */

import type { RetryOptions } from "@/types";

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or the policy's
 * attempt bound is reached. The last error is rethrown.
 *
 * @param fn - Receives the 1-based attempt number
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, isRetryable, delayOverride, onRetry } = options;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isRetryable(error)) {
        break;
      }

      const delayMs =
        delayOverride?.(error, attempt) ??
        computeBackoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);

      onRetry?.({ attempt, maxAttempts, delayMs, error });
      await wait(delayMs);
    }
  }

  throw lastError;
}
