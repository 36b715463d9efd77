/**
 * Rate limiter holding two token buckets: a request-count budget and a
 * throughput budget (e.g. estimated prompt tokens).
 *
 * A cost is taken from both buckets or from neither. The check-and-commit step
 * is synchronous, so no other caller can interleave with it, and it never spans
 * a suspension: waiters sleep outside it and re-enter from the top.
 */

import { type Clock, systemClock } from "../clock";
import type { Logger } from "../logger";
import type { Budget } from "./errors";
import { type ConsumeCheck, type TokenBucket, createTokenBucket } from "./token-bucket";

export interface BudgetConfig {
  capacity: number;
  refillRatePerSecond: number;
}

export interface DualBudgetLimiterConfig {
  requests: BudgetConfig;
  throughput: BudgetConfig;
  clock?: Clock;
  logger?: Logger;
}

export interface AcquireOptions {
  /** Absolute reading of the limiter's clock after which waiting stops */
  deadline?: number;
  signal?: AbortSignal;
}

export type AcquireResult =
  | { status: "granted"; waitedMs: number }
  | { status: "timedOut"; waitedMs: number; waitTimeMs: number }
  | { status: "unsatisfiable"; budget: Budget; cost: number; capacity: number }
  | { status: "cancelled"; waitedMs: number };

export interface BudgetSnapshot {
  requests: number;
  throughput: number;
}

export interface DualBudgetLimiter {
  acquire: (
    requestCost: number,
    throughputCost: number,
    options?: AcquireOptions,
  ) => Promise<AcquireResult>;
  /** Tokens currently available in each bucket (after refill) */
  getAvailable: () => BudgetSnapshot;
  getCapacity: () => BudgetSnapshot;
}

type JointAttempt =
  | { status: "granted" }
  | { status: "unsatisfiable"; budget: Budget; cost: number; capacity: number }
  | { status: "wait"; waitTimeMs: number; exhausted: Budget[] };

/**
 * Derives a per-minute budget: capacity equals the per-minute allowance and
 * refills continuously over sixty seconds.
 */
export const perMinuteBudget = (perMinute: number): BudgetConfig => ({
  capacity: perMinute,
  refillRatePerSecond: perMinute / 60,
});

const formatSeconds = (ms: number): string => (ms / 1000).toFixed(2);

/**
 * Creates the limiter. Each instance owns its buckets; share the instance, not
 * the buckets, between callers.
 *
 * @example
 * ```typescript
 * const limiter = createDualBudgetLimiter({
 *   requests: perMinuteBudget(60),
 *   throughput: perMinuteBudget(90_000),
 * });
 *
 * const result = await limiter.acquire(1, estimateTokenCount(prompt));
 * ```
 */
export const createDualBudgetLimiter = (config: DualBudgetLimiterConfig): DualBudgetLimiter => {
  const { clock = systemClock, logger } = config;

  const buckets: Record<Budget, TokenBucket> = {
    requests: createTokenBucket({
      maxTokens: config.requests.capacity,
      refillRatePerSecond: config.requests.refillRatePerSecond,
      clock,
    }),
    throughput: createTokenBucket({
      maxTokens: config.throughput.capacity,
      refillRatePerSecond: config.throughput.refillRatePerSecond,
      clock,
    }),
  };

  // Critical section: must stay synchronous.
  const tryAcquireBoth = (requestCost: number, throughputCost: number): JointAttempt => {
    const checks: Array<[Budget, number, ConsumeCheck]> = [
      ["requests", requestCost, buckets.requests.check(requestCost)],
      ["throughput", throughputCost, buckets.throughput.check(throughputCost)],
    ];

    let waitTimeMs = 0;
    const exhausted: Budget[] = [];

    for (const [budget, cost, check] of checks) {
      if (check.status === "unsatisfiable") {
        return { status: "unsatisfiable", budget, cost, capacity: check.capacity };
      }
      if (check.status === "insufficient") {
        waitTimeMs = Math.max(waitTimeMs, check.waitTimeMs);
        exhausted.push(budget);
      }
    }

    if (exhausted.length > 0) {
      return { status: "wait", waitTimeMs, exhausted };
    }

    buckets.requests.commit(requestCost);
    buckets.throughput.commit(throughputCost);
    return { status: "granted" };
  };

  const acquire = async (
    requestCost: number,
    throughputCost: number,
    options: AcquireOptions = {},
  ): Promise<AcquireResult> => {
    const { deadline, signal } = options;
    const startedAt = clock.now();

    for (;;) {
      if (signal?.aborted) {
        return { status: "cancelled", waitedMs: clock.now() - startedAt };
      }

      const attempt = tryAcquireBoth(requestCost, throughputCost);

      if (attempt.status === "granted") {
        return { status: "granted", waitedMs: clock.now() - startedAt };
      }

      if (attempt.status === "unsatisfiable") {
        logger?.warn("Rate limit cost can never be satisfied", {
          budget: attempt.budget,
          cost: attempt.cost,
          capacity: attempt.capacity,
        });
        return attempt;
      }

      const now = clock.now();
      const remainingMs = deadline === undefined ? Number.POSITIVE_INFINITY : deadline - now;

      if (remainingMs <= 0) {
        logger?.warn("Rate limit wait timed out", {
          waitedMs: now - startedAt,
          waitTimeMs: attempt.waitTimeMs,
          budgets: attempt.exhausted,
        });
        return { status: "timedOut", waitedMs: now - startedAt, waitTimeMs: attempt.waitTimeMs };
      }

      const sleepMs = Math.min(attempt.waitTimeMs, remainingMs);
      logger?.info(
        `Waiting ${formatSeconds(sleepMs)} seconds: ${attempt.exhausted.join(" and ")} budget exhausted`,
        { sleepMs, requestCost, throughputCost },
      );
      await clock.sleep(sleepMs, signal);
    }
  };

  const getAvailable = (): BudgetSnapshot => ({
    requests: buckets.requests.getAvailableTokens(),
    throughput: buckets.throughput.getAvailableTokens(),
  });

  const getCapacity = (): BudgetSnapshot => ({
    requests: buckets.requests.getCapacity(),
    throughput: buckets.throughput.getCapacity(),
  });

  return { acquire, getAvailable, getCapacity };
};
