/**
 * Rate limiting and retry module exports.
 */

// Token bucket
export {
  createTokenBucket,
  type ConsumeCheck,
  type TokenBucket,
  type TokenBucketConfig,
} from "./token-bucket";

// Dual-budget limiter
export {
  createDualBudgetLimiter,
  perMinuteBudget,
  type AcquireOptions,
  type AcquireResult,
  type BudgetConfig,
  type BudgetSnapshot,
  type DualBudgetLimiter,
  type DualBudgetLimiterConfig,
} from "./dual-budget-limiter";

// Backoff utilities
export {
  assertValidRetryPolicy,
  backoffSchedule,
  calculateBackoffMs,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
} from "./backoff";

// Retry controller
export {
  createRetryController,
  type ErrorClassifier,
  type FailureKind,
  type RetryController,
  type RetryControllerConfig,
  type RetryOptions,
} from "./retry-controller";

// Errors
export {
  CallCancelledError,
  describeCallError,
  isCallError,
  PermanentOperationError,
  RateLimitTimedOutError,
  RateLimitUnsatisfiableError,
  RetriesExhaustedError,
  TransientOperationError,
  type AttemptOutcome,
  type AttemptRecord,
  type Budget,
  type CallError,
} from "./errors";

// Call gate (main entry point)
export {
  createCallGate,
  type CallGate,
  type CallGateConfig,
  type CallGateMetrics,
  type InvokeOptions,
} from "./call-gate";
