/**
 * Token bucket with continuous, clock-driven refill.
 *
 * Tokens grow by `elapsedSeconds * refillRatePerSecond` (clamped to capacity)
 * and shrink only through a successful consumption.
 */

import { type Clock, systemClock } from "../clock";

export interface TokenBucketConfig {
  /** Maximum bucket capacity (tokens) */
  maxTokens: number;
  /** Tokens added per second */
  refillRatePerSecond: number;
  /** Starting tokens (default: maxTokens) */
  initialTokens?: number;
  clock?: Clock;
}

export type ConsumeCheck =
  | { status: "ok" }
  | { status: "insufficient"; deficit: number; waitTimeMs: number }
  | { status: "unsatisfiable"; cost: number; capacity: number };

export interface TokenBucket {
  /** Refills, then reports whether `cost` could be consumed now. Never deducts. */
  check: (cost?: number) => ConsumeCheck;
  /** Refills, then deducts `cost` when available */
  tryConsume: (cost?: number) => ConsumeCheck;
  /** Deducts a cost already approved by `check` without refilling again */
  commit: (cost: number) => void;
  /** Returns the number of available tokens */
  getAvailableTokens: () => number;
  /** Returns the wait time in ms needed to consume `cost` (Infinity if it never fits) */
  getWaitTimeMs: (cost?: number) => number;
  getCapacity: () => number;
  getRefillRatePerSecond: () => number;
  /** Resets the bucket to full capacity */
  reset: () => void;
}

interface TokenBucketState {
  tokens: number;
  capacity: number;
  refillRatePerSecond: number;
  lastRefillTimestamp: number;
}

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

const assertValidCost = (cost: number): void => {
  if (!Number.isFinite(cost) || cost < 0) {
    throw new RangeError(`Token cost must be a finite, non-negative number (got ${cost})`);
  }
};

/**
 * Creates a token bucket rate limiter.
 *
 * @example
 * ```typescript
 * const bucket = createTokenBucket({ maxTokens: 60, refillRatePerSecond: 1 });
 *
 * const result = bucket.tryConsume();
 * if (result.status === "insufficient") {
 *   await clock.sleep(result.waitTimeMs);
 * }
 * ```
 */
export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const {
    maxTokens,
    refillRatePerSecond,
    initialTokens = maxTokens,
    clock = systemClock,
  } = config;

  if (!isPositiveFinite(maxTokens)) {
    throw new RangeError(`maxTokens must be a positive number (got ${maxTokens})`);
  }
  if (!isPositiveFinite(refillRatePerSecond)) {
    throw new RangeError(
      `refillRatePerSecond must be a positive number (got ${refillRatePerSecond})`,
    );
  }
  if (!Number.isFinite(initialTokens) || initialTokens < 0 || initialTokens > maxTokens) {
    throw new RangeError(`initialTokens must be within [0, ${maxTokens}] (got ${initialTokens})`);
  }

  let state: TokenBucketState = {
    tokens: initialTokens,
    capacity: maxTokens,
    refillRatePerSecond,
    lastRefillTimestamp: clock.now(),
  };

  const refill = (): void => {
    const now = clock.now();
    const elapsedSeconds = Math.max(0, now - state.lastRefillTimestamp) / 1000;
    const tokensToAdd = elapsedSeconds * state.refillRatePerSecond;

    state = {
      ...state,
      tokens: Math.min(state.capacity, state.tokens + tokensToAdd),
      lastRefillTimestamp: now,
    };
  };

  const evaluate = (cost: number): ConsumeCheck => {
    if (cost > state.capacity) {
      return { status: "unsatisfiable", cost, capacity: state.capacity };
    }

    if (state.tokens >= cost) {
      return { status: "ok" };
    }

    const deficit = cost - state.tokens;
    return {
      status: "insufficient",
      deficit,
      waitTimeMs: Math.ceil((deficit / state.refillRatePerSecond) * 1000),
    };
  };

  const check = (cost = 1): ConsumeCheck => {
    assertValidCost(cost);
    refill();
    return evaluate(cost);
  };

  const commit = (cost: number): void => {
    assertValidCost(cost);
    if (cost > state.tokens) {
      throw new RangeError(`Cannot commit ${cost} tokens: only ${state.tokens} available`);
    }
    state = { ...state, tokens: state.tokens - cost };
  };

  const tryConsume = (cost = 1): ConsumeCheck => {
    const result = check(cost);
    if (result.status === "ok") {
      commit(cost);
    }
    return result;
  };

  const getWaitTimeMs = (cost = 1): number => {
    const result = check(cost);
    switch (result.status) {
      case "ok":
        return 0;
      case "insufficient":
        return result.waitTimeMs;
      case "unsatisfiable":
        return Number.POSITIVE_INFINITY;
    }
  };

  const getAvailableTokens = (): number => {
    refill();
    return state.tokens;
  };

  const reset = (): void => {
    state = {
      ...state,
      tokens: state.capacity,
      lastRefillTimestamp: clock.now(),
    };
  };

  return {
    check,
    tryConsume,
    commit,
    getAvailableTokens,
    getWaitTimeMs,
    getCapacity: () => state.capacity,
    getRefillRatePerSecond: () => state.refillRatePerSecond,
    reset,
  };
};
