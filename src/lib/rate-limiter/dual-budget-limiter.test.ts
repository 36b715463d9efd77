import { describe, expect, it } from "vitest";

import { createSpyLogger } from "@/test-utils/logger";

import { type ManualClock, createManualClock } from "../clock";
import {
  type AcquireResult,
  type DualBudgetLimiterConfig,
  createDualBudgetLimiter,
  perMinuteBudget,
} from "./dual-budget-limiter";

describe("perMinuteBudget", () => {
  it("should refill the per-minute allowance over sixty seconds", () => {
    expect(perMinuteBudget(60)).toEqual({ capacity: 60, refillRatePerSecond: 1 });
    expect(perMinuteBudget(90000)).toEqual({ capacity: 90000, refillRatePerSecond: 1500 });
  });
});

describe("createDualBudgetLimiter", () => {
  const createLimiter = (
    overrides: Partial<DualBudgetLimiterConfig> = {},
  ): { limiter: ReturnType<typeof createDualBudgetLimiter>; clock: ManualClock } => {
    const clock = createManualClock();
    const limiter = createDualBudgetLimiter({
      requests: perMinuteBudget(60),
      throughput: perMinuteBudget(90000),
      clock,
      ...overrides,
    });
    return { limiter, clock };
  };

  describe("granting", () => {
    it("should grant sixty immediate calls and make the 61st wait one second", async () => {
      const { limiter, clock } = createLimiter();

      for (let i = 0; i < 60; i++) {
        expect(await limiter.acquire(1, 0)).toEqual({ status: "granted", waitedMs: 0 });
      }
      expect(clock.getSleeps()).toEqual([]);

      expect(await limiter.acquire(1, 0)).toEqual({ status: "granted", waitedMs: 1000 });
      expect(clock.getSleeps()).toEqual([1000]);
      expect(limiter.getAvailable().requests).toBe(0);
    });

    it("should deduct from both budgets on grant", async () => {
      const { limiter } = createLimiter();

      await limiter.acquire(1, 2500);

      expect(limiter.getAvailable()).toEqual({ requests: 59, throughput: 87500 });
    });

    it("should wait for the slower of the two budgets", async () => {
      const { limiter, clock } = createLimiter({
        requests: { capacity: 2, refillRatePerSecond: 1 },
        throughput: { capacity: 100, refillRatePerSecond: 10 },
      });

      await limiter.acquire(2, 100);

      // requests needs 1000ms, throughput needs 5000ms
      const result = await limiter.acquire(1, 50);

      expect(clock.getSleeps()).toEqual([5000]);
      expect(result).toEqual({ status: "granted", waitedMs: 5000 });
    });

    it("should report capacity", () => {
      const { limiter } = createLimiter();

      expect(limiter.getCapacity()).toEqual({ requests: 60, throughput: 90000 });
    });
  });

  describe("unsatisfiable costs", () => {
    it("should fail immediately when the throughput cost exceeds capacity", async () => {
      const { limiter, clock } = createLimiter();

      const result = await limiter.acquire(1, 100000);

      expect(result).toEqual({
        status: "unsatisfiable",
        budget: "throughput",
        cost: 100000,
        capacity: 90000,
      });
      expect(clock.getSleeps()).toEqual([]);
      expect(limiter.getAvailable()).toEqual({ requests: 60, throughput: 90000 });
    });

    it("should fail immediately when the request cost exceeds capacity", async () => {
      const { limiter } = createLimiter({ requests: { capacity: 5, refillRatePerSecond: 1 } });

      const result = await limiter.acquire(6, 10);

      expect(result).toMatchObject({ status: "unsatisfiable", budget: "requests" });
      expect(limiter.getAvailable()).toEqual({ requests: 5, throughput: 90000 });
    });

    it("should log the rejection", async () => {
      const logger = createSpyLogger();
      const { limiter } = createLimiter({ logger });

      await limiter.acquire(1, 100000);

      expect(logger.warn).toHaveBeenCalledWith("Rate limit cost can never be satisfied", {
        budget: "throughput",
        cost: 100000,
        capacity: 90000,
      });
    });
  });

  describe("deadlines", () => {
    it("should time out without consuming from either budget", async () => {
      const { limiter, clock } = createLimiter({
        requests: { capacity: 10, refillRatePerSecond: 1 },
        throughput: { capacity: 100, refillRatePerSecond: 10 },
      });
      await limiter.acquire(1, 100);
      expect(limiter.getAvailable()).toEqual({ requests: 9, throughput: 0 });

      const result = await limiter.acquire(1, 100, { deadline: clock.now() + 3000 });

      expect(result).toEqual({ status: "timedOut", waitedMs: 3000, waitTimeMs: 7000 });
      expect(clock.getSleeps()).toEqual([3000]);
      // Only the refill from the elapsed 3s, no deduction
      expect(limiter.getAvailable()).toEqual({ requests: 10, throughput: 30 });
    });

    it("should time out immediately when the deadline already passed", async () => {
      const { limiter, clock } = createLimiter({ requests: { capacity: 1, refillRatePerSecond: 1 } });
      await limiter.acquire(1, 0);

      const result = await limiter.acquire(1, 0, { deadline: clock.now() });

      expect(result).toEqual({ status: "timedOut", waitedMs: 0, waitTimeMs: 1000 });
      expect(clock.getSleeps()).toEqual([]);
    });

    it("should grant when budget frees up before the deadline", async () => {
      const { limiter, clock } = createLimiter({ requests: { capacity: 1, refillRatePerSecond: 1 } });
      await limiter.acquire(1, 0);

      const result = await limiter.acquire(1, 0, { deadline: clock.now() + 5000 });

      expect(result).toEqual({ status: "granted", waitedMs: 1000 });
    });

    it("should grant immediately regardless of deadline when budget is available", async () => {
      const { limiter, clock } = createLimiter();

      const result = await limiter.acquire(1, 10, { deadline: clock.now() });

      expect(result).toEqual({ status: "granted", waitedMs: 0 });
    });
  });

  describe("cancellation", () => {
    it("should return cancelled for an already aborted signal", async () => {
      const { limiter } = createLimiter();
      const controller = new AbortController();
      controller.abort();

      const result = await limiter.acquire(1, 10, { signal: controller.signal });

      expect(result).toEqual({ status: "cancelled", waitedMs: 0 });
      expect(limiter.getAvailable()).toEqual({ requests: 60, throughput: 90000 });
    });

    it("should stop waiting when the signal aborts mid-wait", async () => {
      const { limiter, clock } = createLimiter({ requests: { capacity: 1, refillRatePerSecond: 1 } });
      const controller = new AbortController();
      await limiter.acquire(1, 0);
      clock.onSleep(() => controller.abort());

      const result = await limiter.acquire(1, 0, { signal: controller.signal });

      expect(result).toEqual({ status: "cancelled", waitedMs: 0 });
      expect(limiter.getAvailable().requests).toBe(0);
    });
  });

  describe("logging", () => {
    it("should log each wait with the exhausted budget", async () => {
      const logger = createSpyLogger();
      const { limiter } = createLimiter({
        requests: { capacity: 1, refillRatePerSecond: 1 },
        logger,
      });
      await limiter.acquire(1, 0);

      await limiter.acquire(1, 0);

      expect(logger.info).toHaveBeenCalledWith(
        "Waiting 1.00 seconds: requests budget exhausted",
        { sleepMs: 1000, requestCost: 1, throughputCost: 0 },
      );
    });

    it("should name both budgets when both are exhausted", async () => {
      const logger = createSpyLogger();
      const { limiter } = createLimiter({
        requests: { capacity: 1, refillRatePerSecond: 1 },
        throughput: { capacity: 10, refillRatePerSecond: 5 },
        logger,
      });
      await limiter.acquire(1, 10);

      await limiter.acquire(1, 10);

      expect(logger.info).toHaveBeenCalledWith(
        "Waiting 2.00 seconds: requests and throughput budget exhausted",
        { sleepMs: 2000, requestCost: 1, throughputCost: 10 },
      );
    });
  });

  describe("concurrent callers", () => {
    it("should grant every waiter without overdrawing", async () => {
      const { limiter, clock } = createLimiter({ requests: { capacity: 2, refillRatePerSecond: 1 } });

      const results = await Promise.all([
        limiter.acquire(1, 0),
        limiter.acquire(1, 0),
        limiter.acquire(1, 0),
        limiter.acquire(1, 0),
      ]);

      expect(results.map((result) => result.status)).toEqual([
        "granted",
        "granted",
        "granted",
        "granted",
      ]);
      expect(clock.now()).toBe(2000);
      expect(limiter.getAvailable().requests).toBe(0);
    });
  });

  describe("bounded throughput", () => {
    it("should never grant more than capacity plus refill over any window", async () => {
      const capacity = 50;
      const refillRatePerSecond = 5;
      const { limiter, clock } = createLimiter({
        requests: { capacity: 1000, refillRatePerSecond: 1000 },
        throughput: { capacity, refillRatePerSecond },
      });

      let seed = 7;
      const next = (): number => {
        seed = (seed * 16807) % 2147483647;
        return seed / 2147483647;
      };

      const grants: Array<{ at: number; cost: number }> = [];
      for (let i = 0; i < 400; i++) {
        clock.advance(Math.floor(next() * 1500));
        const cost = Math.floor(next() * 30);
        const result: AcquireResult = await limiter.acquire(1, cost, { deadline: clock.now() });
        if (result.status === "granted") {
          grants.push({ at: clock.now(), cost });
        }

        const available = limiter.getAvailable().throughput;
        expect(available).toBeGreaterThanOrEqual(0);
        expect(available).toBeLessThanOrEqual(capacity);
      }

      expect(grants.length).toBeGreaterThan(0);
      for (let start = 0; start < grants.length; start++) {
        let total = 0;
        for (let end = start; end < grants.length; end++) {
          total += grants[end].cost;
          const windowSeconds = (grants[end].at - grants[start].at) / 1000;
          expect(total).toBeLessThanOrEqual(capacity + refillRatePerSecond * windowSeconds + 1e-9);
        }
      }
    });
  });

  it("should reject negative costs", async () => {
    const { limiter } = createLimiter();

    await expect(limiter.acquire(-1, 0)).rejects.toThrow(RangeError);
  });
});
