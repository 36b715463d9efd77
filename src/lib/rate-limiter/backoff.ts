/**
 * Deterministic exponential backoff for the retry controller.
 */

export interface RetryPolicy {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Wait after the first failure (ms) */
  minWaitMs: number;
  /** Upper bound for any single wait (ms) */
  maxWaitMs: number;
  /** Growth factor between consecutive waits (> 1) */
  multiplier: number;
}

/**
 * Default policy: three attempts, waiting 2s then 4s, never more than 10s.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  minWaitMs: 2000,
  maxWaitMs: 10000,
  multiplier: 2,
};

/**
 * Throws a RangeError describing the first violated constraint.
 */
export const assertValidRetryPolicy = (policy: RetryPolicy): void => {
  const { maxAttempts, minWaitMs, maxWaitMs, multiplier } = policy;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${maxAttempts})`);
  }
  if (!Number.isFinite(minWaitMs) || minWaitMs < 0) {
    throw new RangeError(`minWaitMs must be a non-negative number (got ${minWaitMs})`);
  }
  if (!Number.isFinite(maxWaitMs) || maxWaitMs < minWaitMs) {
    throw new RangeError(`maxWaitMs must be >= minWaitMs (got ${maxWaitMs} < ${minWaitMs})`);
  }
  if (!Number.isFinite(multiplier) || multiplier <= 1) {
    throw new RangeError(`multiplier must be > 1 (got ${multiplier})`);
  }
};

/**
 * Wait before retrying after attempt `failedAttempt` (1-based) failed:
 * `min(maxWaitMs, minWaitMs * multiplier^(failedAttempt - 1))`.
 *
 * @example
 * ```typescript
 * const policy = { maxAttempts: 3, minWaitMs: 2000, maxWaitMs: 10000, multiplier: 2 };
 * calculateBackoffMs(1, policy); // 2000
 * calculateBackoffMs(2, policy); // 4000
 * calculateBackoffMs(4, policy); // 10000 (capped)
 * ```
 */
export const calculateBackoffMs = (failedAttempt: number, policy: RetryPolicy): number => {
  const { minWaitMs, maxWaitMs, multiplier } = policy;
  return Math.min(maxWaitMs, minWaitMs * multiplier ** (failedAttempt - 1));
};

/**
 * Every wait a call would sleep if all attempts failed transiently.
 */
export const backoffSchedule = (policy: RetryPolicy): number[] =>
  Array.from({ length: policy.maxAttempts - 1 }, (_, index) =>
    calculateBackoffMs(index + 1, policy),
  );
