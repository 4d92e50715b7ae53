/**
 * Retry policy type definitions
 */

export interface RetryPolicy {
  /** Maximum number of attempts (including the first one) */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay */
  maxDelayMs: number;
}

export type RetryAttemptInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export interface RetryOptions {
  policy: RetryPolicy;
  /** Decides whether a failed attempt may be retried */
  isRetryable: (error: unknown) => boolean;
  /** Overrides the computed backoff (e.g. Retry-After). Return null to use backoff. */
  delayOverride?: (error: unknown, attempt: number) => number | null;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}
