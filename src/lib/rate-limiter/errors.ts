/**
 * Terminal outcomes of a guarded call.
 *
 * Rate-limit errors mean the operation was never invoked. Operation errors carry
 * the attempt history of the retry controller.
 */

export type Budget = "requests" | "throughput";

export type AttemptOutcome = "success" | "transient-failure" | "permanent-failure";

export interface AttemptRecord {
  /** 1-based */
  attemptNumber: number;
  /** Backoff slept before this attempt (0 for the first) */
  waitBeforeAttemptMs: number;
  outcome: AttemptOutcome;
}

/**
 * Error thrown when a requested cost exceeds a budget's capacity.
 * Waiting can never satisfy it.
 */
export class RateLimitUnsatisfiableError extends Error {
  constructor(
    message: string,
    public readonly budget: Budget,
    public readonly cost: number,
    public readonly capacity: number,
  ) {
    super(message);
    this.name = "RateLimitUnsatisfiableError";
  }
}

/**
 * Error thrown when the deadline passed while waiting for budget.
 */
export class RateLimitTimedOutError extends Error {
  constructor(
    message: string,
    public readonly waitedMs: number,
    /** Further wait that would still have been needed */
    public readonly waitTimeMs: number,
  ) {
    super(message);
    this.name = "RateLimitTimedOutError";
  }
}

/**
 * A failure the caller classified as retryable.
 */
export class TransientOperationError extends Error {
  constructor(
    message: string,
    cause: unknown,
    public readonly attemptNumber: number,
  ) {
    super(message, { cause });
    this.name = "TransientOperationError";
  }
}

/**
 * A failure the caller classified as non-retryable. Raised on first occurrence.
 */
export class PermanentOperationError extends Error {
  constructor(
    message: string,
    cause: unknown,
    public readonly attempts: readonly AttemptRecord[],
  ) {
    super(message, { cause });
    this.name = "PermanentOperationError";
  }
}

/**
 * Error thrown when every allowed attempt failed transiently.
 */
export class RetriesExhaustedError extends Error {
  constructor(
    message: string,
    public readonly lastError: TransientOperationError,
    public readonly attempts: readonly AttemptRecord[],
  ) {
    super(message, { cause: lastError });
    this.name = "RetriesExhaustedError";
  }
}

/**
 * Error thrown when the caller's signal aborted a wait or stopped further attempts.
 */
export class CallCancelledError extends Error {
  constructor(
    message: string,
    public readonly stage: "rate-limit" | "retry",
    public readonly attempts: readonly AttemptRecord[] = [],
  ) {
    super(message);
    this.name = "CallCancelledError";
  }
}

export type CallError =
  | RateLimitUnsatisfiableError
  | RateLimitTimedOutError
  | PermanentOperationError
  | RetriesExhaustedError
  | CallCancelledError;

export const isCallError = (error: unknown): error is CallError =>
  error instanceof RateLimitUnsatisfiableError ||
  error instanceof RateLimitTimedOutError ||
  error instanceof PermanentOperationError ||
  error instanceof RetriesExhaustedError ||
  error instanceof CallCancelledError;

const pluralize = (count: number, word: string): string =>
  `${count} ${word}${count === 1 ? "" : "s"}`;

/** Reads a server-suggested delay (such as a parsed Retry-After) off an error. */
const retryAfterMsOf = (error: unknown): number | null =>
  typeof error === "object" &&
  error !== null &&
  "retryAfterMs" in error &&
  typeof error.retryAfterMs === "number"
    ? error.retryAfterMs
    : null;

/**
 * User-facing message for a call failure. Rate-limit kinds and retry exhaustion
 * never share wording.
 */
export const describeCallError = (error: unknown): string => {
  if (error instanceof RateLimitTimedOutError) {
    return "The service is busy right now. Please try again later.";
  }
  if (error instanceof RateLimitUnsatisfiableError) {
    return `This request is too large for the configured ${error.budget} budget (${error.cost} > ${error.capacity}). Please shorten it.`;
  }
  if (error instanceof RetriesExhaustedError) {
    const failed = `The request failed after ${pluralize(error.attempts.length, "attempt")}.`;
    const retryAfterMs = retryAfterMsOf(error.lastError.cause);
    if (retryAfterMs !== null && retryAfterMs > 0) {
      const seconds = Math.ceil(retryAfterMs / 1000);
      return `${failed} Please try again in ${pluralize(seconds, "second")}.`;
    }
    return `${failed} Please try again later.`;
  }
  if (error instanceof PermanentOperationError) {
    const reason = error.cause instanceof Error ? error.cause.message : String(error.cause);
    return `The request was rejected: ${reason}`;
  }
  if (error instanceof CallCancelledError) {
    return "The request was cancelled.";
  }
  return "An unexpected error occurred.";
};
