import { describe, expect, it, vi } from "vitest";

import { createSpyLogger } from "@/test-utils/logger";

import { createManualClock } from "../clock";
import type { RetryPolicy } from "./backoff";
import {
  type AttemptRecord,
  CallCancelledError,
  PermanentOperationError,
  RetriesExhaustedError,
  TransientOperationError,
} from "./errors";
import { type ErrorClassifier, createRetryController } from "./retry-controller";

class BadInputError extends Error {}

const classify: ErrorClassifier = (error) =>
  error instanceof BadInputError ? "permanent" : "transient";

const policy: RetryPolicy = { maxAttempts: 3, minWaitMs: 2000, maxWaitMs: 10000, multiplier: 2 };

const setup = () => {
  const clock = createManualClock();
  const logger = createSpyLogger();
  const retry = createRetryController({ clock, logger });
  const records: AttemptRecord[] = [];
  const onAttempt = (record: AttemptRecord): void => {
    records.push(record);
  };
  return { clock, logger, retry, records, onAttempt };
};

describe("createRetryController", () => {
  it("should return the first successful result without waiting", async () => {
    const { clock, retry, records, onAttempt } = setup();
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    await expect(retry.execute(operation, { policy, classify, onAttempt })).resolves.toBe("ok");

    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.getSleeps()).toEqual([]);
    expect(records).toEqual([{ attemptNumber: 1, waitBeforeAttemptMs: 0, outcome: "success" }]);
  });

  it("should back off 2s then 4s and succeed on the third attempt", async () => {
    const { clock, retry, records, onAttempt } = setup();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("unavailable"))
      .mockRejectedValueOnce(new Error("unavailable"))
      .mockResolvedValue("done");

    const result = await retry.execute(operation, { policy, classify, onAttempt });

    expect(result).toBe("done");
    expect(clock.getSleeps()).toEqual([2000, 4000]);
    expect(records).toEqual([
      { attemptNumber: 1, waitBeforeAttemptMs: 0, outcome: "transient-failure" },
      { attemptNumber: 2, waitBeforeAttemptMs: 2000, outcome: "transient-failure" },
      { attemptNumber: 3, waitBeforeAttemptMs: 4000, outcome: "success" },
    ]);
  });

  it("should raise RetriesExhaustedError after the final transient failure", async () => {
    const { clock, retry } = setup();
    const lastFailure = new Error("third");
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(lastFailure);

    const error = await retry.execute(operation, { policy, classify }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (!(error instanceof RetriesExhaustedError)) return;
    expect(error.attempts).toEqual([
      { attemptNumber: 1, waitBeforeAttemptMs: 0, outcome: "transient-failure" },
      { attemptNumber: 2, waitBeforeAttemptMs: 2000, outcome: "transient-failure" },
      { attemptNumber: 3, waitBeforeAttemptMs: 4000, outcome: "transient-failure" },
    ]);
    expect(error.lastError).toBeInstanceOf(TransientOperationError);
    expect(error.lastError.cause).toBe(lastFailure);
    expect(error.lastError.attemptNumber).toBe(3);
    expect(error.message).toBe("operation failed after 3 attempts: third");
    // No wait after the final attempt
    expect(clock.getSleeps()).toEqual([2000, 4000]);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should raise a permanent failure immediately without waiting", async () => {
    const { clock, retry, records, onAttempt } = setup();
    const failure = new BadInputError("malformed prompt");
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    const error = await retry
      .execute(operation, { policy, classify, onAttempt })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentOperationError);
    if (!(error instanceof PermanentOperationError)) return;
    expect(error.cause).toBe(failure);
    expect(error.attempts).toEqual([
      { attemptNumber: 1, waitBeforeAttemptMs: 0, outcome: "permanent-failure" },
    ]);
    expect(records).toHaveLength(1);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.getSleeps()).toEqual([]);
  });

  it("should stop at a permanent failure that follows a transient one", async () => {
    const { clock, retry } = setup();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new BadInputError("rejected"));

    await expect(retry.execute(operation, { policy, classify })).rejects.toBeInstanceOf(
      PermanentOperationError,
    );
    expect(operation).toHaveBeenCalledTimes(2);
    expect(clock.getSleeps()).toEqual([2000]);
  });

  it("should pass the raw error to the classifier", async () => {
    const { retry } = setup();
    const failure = { status: 400 };
    const classifier = vi.fn<ErrorClassifier>().mockReturnValue("permanent");

    await expect(
      retry.execute(() => Promise.reject(failure), { policy, classify: classifier }),
    ).rejects.toBeInstanceOf(PermanentOperationError);
    expect(classifier).toHaveBeenCalledWith(failure);
  });

  it("should not retry at all with a single allowed attempt", async () => {
    const { clock, retry } = setup();
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("flaky"));

    await expect(
      retry.execute(operation, { policy: { ...policy, maxAttempts: 1 }, classify }),
    ).rejects.toBeInstanceOf(RetriesExhaustedError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.getSleeps()).toEqual([]);
  });

  it("should cap backoff at maxWait", async () => {
    const { clock, retry } = setup();
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("flaky"));

    await expect(
      retry.execute(operation, { policy: { ...policy, maxAttempts: 5 }, classify }),
    ).rejects.toBeInstanceOf(RetriesExhaustedError);
    expect(clock.getSleeps()).toEqual([2000, 4000, 8000, 10000]);
  });

  it("should stop issuing attempts once cancelled during backoff", async () => {
    const { clock, retry } = setup();
    const controller = new AbortController();
    clock.onSleep(() => controller.abort());
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("flaky"));

    const error = await retry
      .execute(operation, { policy, classify, signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CallCancelledError);
    if (!(error instanceof CallCancelledError)) return;
    expect(error.stage).toBe("retry");
    expect(error.attempts).toHaveLength(1);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it.each([1, 3])(
    "should report cancellation when aborted inside attempt %i",
    async (abortOnAttempt) => {
      const { clock, retry } = setup();
      const controller = new AbortController();
      let calls = 0;
      const operation = vi.fn(async (): Promise<string> => {
        calls++;
        if (calls === abortOnAttempt) controller.abort();
        throw new Error("connection reset");
      });

      const error = await retry
        .execute(operation, { policy, classify, signal: controller.signal, label: "chat" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CallCancelledError);
      if (!(error instanceof CallCancelledError)) return;
      expect(error.message).toBe(`chat cancelled during attempt ${abortOnAttempt}`);
      expect(error.stage).toBe("retry");
      expect(error.attempts).toHaveLength(abortOnAttempt);
      expect(operation).toHaveBeenCalledTimes(abortOnAttempt);
      expect(clock.getSleeps()).toEqual([2000, 4000].slice(0, abortOnAttempt - 1));
    },
  );

  it("should report cancellation over a permanent failure raised by the abort", async () => {
    const { retry } = setup();
    const controller = new AbortController();
    const operation = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new BadInputError("request body closed");
    });

    await expect(
      retry.execute(operation, { policy, classify, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CallCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should not start when already cancelled", async () => {
    const { retry } = setup();
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    await expect(
      retry.execute(operation, { policy, classify, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CallCancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it("should reject an invalid policy before invoking the operation", async () => {
    const { retry } = setup();
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    await expect(
      retry.execute(operation, { policy: { ...policy, multiplier: 0.5 }, classify }),
    ).rejects.toThrow(RangeError);
    expect(operation).not.toHaveBeenCalled();
  });

  it("should log each retry and the final exhaustion", async () => {
    const { logger, retry } = setup();
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("503"));

    await expect(
      retry.execute(operation, { policy: { ...policy, maxAttempts: 2 }, classify, label: "generate" }),
    ).rejects.toBeInstanceOf(RetriesExhaustedError);

    expect(logger.warn).toHaveBeenCalledWith("Retrying request", {
      label: "generate",
      attemptNumber: 1,
      nextAttempt: 2,
      backoffMs: 2000,
      error: "503",
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Request failed: retries exhausted",
      expect.any(TransientOperationError),
      {
        label: "generate",
        attempts: [
          { attemptNumber: 1, waitBeforeAttemptMs: 0, outcome: "transient-failure" },
          { attemptNumber: 2, waitBeforeAttemptMs: 2000, outcome: "transient-failure" },
        ],
      },
    );
  });
});
