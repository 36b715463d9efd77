/**
 * Call gate: the single entry point for outbound calls.
 *
 * Order of operations:
 * 1. Acquire request and throughput budget (skipped when rate limiting is disabled).
 *    Unsatisfiable, timed-out and cancelled acquisitions fail the call; the
 *    operation is never invoked and nothing is retried.
 * 2. Run the operation through the retry controller and return its outcome as is.
 */

import { type Clock, systemClock } from "../clock";
import type { RateLimitingConfig } from "../config";
import type { Logger } from "../logger";
import { type RetryPolicy, assertValidRetryPolicy } from "./backoff";
import {
  type BudgetSnapshot,
  type DualBudgetLimiter,
  createDualBudgetLimiter,
  perMinuteBudget,
} from "./dual-budget-limiter";
import {
  type AttemptRecord,
  CallCancelledError,
  RateLimitTimedOutError,
  RateLimitUnsatisfiableError,
} from "./errors";
import {
  type ErrorClassifier,
  type RetryController,
  createRetryController,
} from "./retry-controller";

export interface CallGateConfig {
  rateLimiting: RateLimitingConfig;
  retry: RetryPolicy;
  /** Default failure classifier for every call */
  classify: ErrorClassifier;
  /** Shared limiter; built from `rateLimiting` when omitted. Must use the gate's clock. */
  limiter?: DualBudgetLimiter;
  retryController?: RetryController;
  clock?: Clock;
  logger?: Logger;
}

export interface InvokeOptions {
  /** Request-count cost (default 1) */
  requestCost?: number;
  /** Throughput cost, e.g. estimated prompt tokens (default 0) */
  throughputCost?: number;
  /** Absolute reading of the gate's clock bounding the wait for budget */
  deadline?: number;
  /** Relative alternative to `deadline` */
  timeoutMs?: number;
  /** Retry policy override */
  policy?: RetryPolicy;
  /** Classifier override */
  classify?: ErrorClassifier;
  signal?: AbortSignal;
  onAttempt?: (record: AttemptRecord) => void;
  label?: string;
}

export interface CallGateMetrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  /** Attempts beyond the first */
  totalRetries: number;
  /** Calls that had to wait for budget */
  rateLimitWaits: number;
  rateLimitWaitTimeMs: number;
  /** Calls refused by the limiter (unsatisfiable, timed out or cancelled) */
  rateLimitRejections: number;
}

export interface CallGate {
  invoke: <T>(operation: () => Promise<T>, options?: InvokeOptions) => Promise<T>;
  /** Returns a function that runs `fn` through `invoke` */
  wrap: <A extends unknown[], T>(
    fn: (...args: A) => Promise<T>,
    options?: InvokeOptions | ((...args: A) => InvokeOptions),
  ) => (...args: A) => Promise<T>;
  isRateLimitingEnabled: () => boolean;
  /** Available budget, or null when rate limiting is disabled */
  getAvailableBudget: () => BudgetSnapshot | null;
  getMetrics: () => CallGateMetrics;
  resetMetrics: () => void;
}

const emptyMetrics = (): CallGateMetrics => ({
  totalCalls: 0,
  successfulCalls: 0,
  failedCalls: 0,
  totalRetries: 0,
  rateLimitWaits: 0,
  rateLimitWaitTimeMs: 0,
  rateLimitRejections: 0,
});

/**
 * Creates a call gate.
 *
 * @example
 * ```typescript
 * const gate = createCallGate({
 *   rateLimiting: config.rateLimiting,
 *   retry: config.retry,
 *   classify: classifyInferenceError,
 *   logger,
 * });
 *
 * const text = await gate.invoke(() => client.generate(prompt), {
 *   throughputCost: estimateTokenCount(prompt),
 *   timeoutMs: 30_000,
 * });
 * ```
 */
export const createCallGate = (config: CallGateConfig): CallGate => {
  const {
    rateLimiting,
    retry: retryPolicy,
    classify: defaultClassify,
    clock = systemClock,
    logger,
  } = config;

  assertValidRetryPolicy(retryPolicy);

  const limiter: DualBudgetLimiter | undefined = rateLimiting.enabled
    ? (config.limiter ??
      createDualBudgetLimiter({
        requests: perMinuteBudget(rateLimiting.maxRequestsPerMinute),
        throughput: perMinuteBudget(rateLimiting.maxTokensPerMinute),
        clock,
        logger: logger?.child({ component: "rate-limiter" }),
      }))
    : undefined;

  const retryController =
    config.retryController ??
    createRetryController({ clock, logger: logger?.child({ component: "retry" }) });

  let metrics = emptyMetrics();

  if (limiter) {
    logger?.info("Rate limiter initialized", {
      maxRequestsPerMinute: rateLimiting.maxRequestsPerMinute,
      maxTokensPerMinute: rateLimiting.maxTokensPerMinute,
    });
  } else {
    logger?.info("Rate limiting disabled");
  }

  const resolveDeadline = (options: InvokeOptions): number | undefined => {
    if (options.deadline !== undefined) {
      return options.deadline;
    }
    const timeoutMs = options.timeoutMs ?? rateLimiting.acquireTimeoutMs;
    return timeoutMs === undefined ? undefined : clock.now() + timeoutMs;
  };

  const acquireBudget = async (
    activeLimiter: DualBudgetLimiter,
    options: InvokeOptions,
    label: string,
  ): Promise<void> => {
    const { requestCost = 1, throughputCost = 0, signal } = options;

    const result = await activeLimiter.acquire(requestCost, throughputCost, {
      deadline: resolveDeadline(options),
      signal,
    });

    switch (result.status) {
      case "granted":
        if (result.waitedMs > 0) {
          metrics.rateLimitWaits++;
          metrics.rateLimitWaitTimeMs += result.waitedMs;
        }
        return;
      case "unsatisfiable":
        metrics.rateLimitRejections++;
        throw new RateLimitUnsatisfiableError(
          `${label} needs ${result.cost} ${result.budget} tokens but the budget holds ${result.capacity}`,
          result.budget,
          result.cost,
          result.capacity,
        );
      case "timedOut":
        metrics.rateLimitRejections++;
        throw new RateLimitTimedOutError(
          `${label} timed out after waiting ${result.waitedMs}ms for rate limit budget`,
          result.waitedMs,
          result.waitTimeMs,
        );
      case "cancelled":
        metrics.rateLimitRejections++;
        throw new CallCancelledError(
          `${label} cancelled while waiting for rate limit budget`,
          "rate-limit",
        );
    }
  };

  const invoke = async <T>(
    operation: () => Promise<T>,
    options: InvokeOptions = {},
  ): Promise<T> => {
    const {
      policy = retryPolicy,
      classify = defaultClassify,
      signal,
      onAttempt,
      label = "call",
    } = options;

    metrics.totalCalls++;

    try {
      if (limiter) {
        await acquireBudget(limiter, options, label);
      }

      const value = await retryController.execute(operation, {
        policy,
        classify,
        signal,
        label,
        onAttempt: (record) => {
          if (record.attemptNumber > 1) {
            metrics.totalRetries++;
          }
          onAttempt?.(record);
        },
      });

      metrics.successfulCalls++;
      return value;
    } catch (error) {
      metrics.failedCalls++;
      throw error;
    }
  };

  const wrap: CallGate["wrap"] =
    (fn, options) =>
    (...args) =>
      invoke(() => fn(...args), typeof options === "function" ? options(...args) : options);

  return {
    invoke,
    wrap,
    isRateLimitingEnabled: () => limiter !== undefined,
    getAvailableBudget: () => limiter?.getAvailable() ?? null,
    getMetrics: () => ({ ...metrics }),
    resetMetrics: () => {
      metrics = emptyMetrics();
    },
  };
};
