import type { RetryPolicy, RetryPolicyOptions } from './types';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_BACKOFF_FACTOR = 2;
export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];

/**
 * Builds a frozen retry policy. Zero and negative values fall back to the
 * defaults, so an unset numeric field and an explicit 0 behave the same.
 */
export function createRetryPolicy(options: RetryPolicyOptions = {}): RetryPolicy {
  return Object.freeze({
    maxRetries: positiveOr(options.maxRetries, DEFAULT_MAX_RETRIES),
    baseDelayMs: positiveOr(options.baseDelayMs, DEFAULT_BASE_DELAY_MS),
    maxDelayMs: positiveOr(options.maxDelayMs, DEFAULT_MAX_DELAY_MS),
    backoffFactor: positiveOr(options.backoffFactor, DEFAULT_BACKOFF_FACTOR),
    retryableStatusCodes: new Set(options.retryableStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES),
  });
}

/**
 * Delay before the retry that follows attempt `attempt` (zero-based):
 * `min(baseDelay * factor^attempt, maxDelay)`.
 */
export function delayForAttempt(
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor'>,
  attempt: number,
): number {
  const exponent = Math.max(0, Math.floor(attempt));
  const delay = policy.baseDelayMs * policy.backoffFactor ** exponent;
  if (!Number.isFinite(delay)) {
    return policy.maxDelayMs;
  }
  return Math.min(delay, policy.maxDelayMs);
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}
