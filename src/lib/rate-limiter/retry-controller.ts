/**
 * Bounded retry with deterministic exponential backoff.
 *
 * The controller is policy-agnostic: the caller supplies the classifier that
 * decides whether a failure is worth retrying. It keeps no state between calls.
 */

import { type Clock, systemClock } from "../clock";
import type { Logger } from "../logger";
import { type RetryPolicy, assertValidRetryPolicy, calculateBackoffMs } from "./backoff";
import {
  type AttemptRecord,
  CallCancelledError,
  PermanentOperationError,
  RetriesExhaustedError,
  TransientOperationError,
} from "./errors";

export type FailureKind = "transient" | "permanent";

/** Maps an operation failure to transient (retry) or permanent (give up). */
export type ErrorClassifier = (error: unknown) => FailureKind;

export interface RetryOptions {
  policy: RetryPolicy;
  classify: ErrorClassifier;
  /** Stops new attempts and interrupts backoff waits */
  signal?: AbortSignal;
  /** Called after every attempt with its record */
  onAttempt?: (record: AttemptRecord) => void;
  /** Name used in log entries and error messages */
  label?: string;
}

export interface RetryControllerConfig {
  clock?: Clock;
  logger?: Logger;
}

export interface RetryController {
  execute: <T>(operation: () => Promise<T>, options: RetryOptions) => Promise<T>;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

const runAttempt = async <T>(operation: () => Promise<T>): Promise<AttemptResult<T>> => {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error };
  }
};

/**
 * Creates a retry controller.
 *
 * @example
 * ```typescript
 * const retry = createRetryController({ logger });
 *
 * const text = await retry.execute(() => client.generate(prompt), {
 *   policy: DEFAULT_RETRY_POLICY,
 *   classify: classifyInferenceError,
 * });
 * ```
 */
export const createRetryController = (config: RetryControllerConfig = {}): RetryController => {
  const { clock = systemClock, logger } = config;

  const execute = async <T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> => {
    const { policy, classify, signal, onAttempt, label = "operation" } = options;
    assertValidRetryPolicy(policy);

    const attempts: AttemptRecord[] = [];
    let waitBeforeAttemptMs = 0;

    const record = (attemptNumber: number, outcome: AttemptRecord["outcome"]): void => {
      const entry: AttemptRecord = { attemptNumber, waitBeforeAttemptMs, outcome };
      attempts.push(entry);
      onAttempt?.(entry);
    };

    for (let attemptNumber = 1; attemptNumber <= policy.maxAttempts; attemptNumber++) {
      if (signal?.aborted) {
        logger?.info("Retry loop cancelled", { label, attemptNumber });
        throw new CallCancelledError(
          `${label} cancelled before attempt ${attemptNumber}`,
          "retry",
          [...attempts],
        );
      }

      const result = await runAttempt(operation);

      if (result.ok) {
        record(attemptNumber, "success");
        if (attemptNumber > 1) {
          logger?.info("Request succeeded after retry", { label, attemptNumber });
        }
        return result.value;
      }

      const { error } = result;

      if (signal?.aborted) {
        record(attemptNumber, "transient-failure");
        logger?.info("Retry loop cancelled", { label, attemptNumber });
        throw new CallCancelledError(
          `${label} cancelled during attempt ${attemptNumber}`,
          "retry",
          [...attempts],
        );
      }

      if (classify(error) === "permanent") {
        record(attemptNumber, "permanent-failure");
        logger?.warn("Request failed: permanent error", {
          label,
          attemptNumber,
          error: errorMessage(error),
        });
        throw new PermanentOperationError(
          `${label} failed permanently on attempt ${attemptNumber}: ${errorMessage(error)}`,
          error,
          [...attempts],
        );
      }

      record(attemptNumber, "transient-failure");
      const transient = new TransientOperationError(errorMessage(error), error, attemptNumber);

      if (attemptNumber === policy.maxAttempts) {
        logger?.error("Request failed: retries exhausted", transient, { label, attempts });
        throw new RetriesExhaustedError(
          `${label} failed after ${attemptNumber} attempts: ${transient.message}`,
          transient,
          [...attempts],
        );
      }

      waitBeforeAttemptMs = calculateBackoffMs(attemptNumber, policy);
      logger?.warn("Retrying request", {
        label,
        attemptNumber,
        nextAttempt: attemptNumber + 1,
        backoffMs: waitBeforeAttemptMs,
        error: transient.message,
      });
      await clock.sleep(waitBeforeAttemptMs, signal);
    }

    // Unreachable: the final attempt either returns or throws.
    throw new RangeError(`maxAttempts must be >= 1 (got ${policy.maxAttempts})`);
  };

  return { execute };
};
