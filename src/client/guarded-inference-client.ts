/**
 * Inference client whose every call passes through a call gate: the prompt is
 * charged against the request and token budgets, then sent with retries.
 */

import { classifyInferenceError } from "@/adapters/errors";
import { estimateTokenCount } from "@/adapters/cost";
import { createOllamaClient } from "@/adapters/ollama";
import type { GenerateOptions, InferenceClient } from "@/adapters/types";
import type { Clock } from "@/lib/clock";
import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";
import {
  type AttemptRecord,
  type BudgetSnapshot,
  type CallGate,
  type CallGateMetrics,
  createCallGate,
  describeCallError,
} from "@/lib/rate-limiter";

export interface GuardedInferenceClientConfig {
  config: Pick<AppConfig, "rateLimiting" | "retry" | "ollama">;
  /** Backend; an Ollama client built from `config.ollama` when omitted */
  client?: InferenceClient;
  clock?: Clock;
  logger?: Logger;
}

export interface GuardedGenerateOptions extends GenerateOptions {
  /** Bound on the wait for rate limit budget (defaults to the configured timeout) */
  timeoutMs?: number;
  onAttempt?: (record: AttemptRecord) => void;
}

export interface GuardedInferenceClient {
  readonly model: string;
  /** Throws a call error when the gate refuses or the model keeps failing */
  generate: (prompt: string, options?: GuardedGenerateOptions) => Promise<string>;
  /** Logs the failure and returns `fallback` instead of throwing */
  safeGenerate: (
    prompt: string,
    fallback: string,
    options?: GuardedGenerateOptions,
  ) => Promise<string>;
  getMetrics: () => CallGateMetrics;
  getAvailableBudget: () => BudgetSnapshot | null;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Creates a guarded inference client.
 *
 * @example
 * ```typescript
 * const inference = createGuardedInferenceClient({ config, logger });
 *
 * const summary = await inference.safeGenerate(prompt, "Summary unavailable.");
 * ```
 */
export const createGuardedInferenceClient = (
  options: GuardedInferenceClientConfig,
): GuardedInferenceClient => {
  const { config, clock, logger } = options;
  const client =
    options.client ??
    createOllamaClient({ ...config.ollama, logger: logger?.child({ component: "ollama" }) });

  const gate: CallGate = createCallGate({
    rateLimiting: config.rateLimiting,
    retry: config.retry,
    classify: classifyInferenceError,
    clock,
    logger,
  });

  const generate = (
    prompt: string,
    generateOptions: GuardedGenerateOptions = {},
  ): Promise<string> => {
    const { timeoutMs, onAttempt, ...requestOptions } = generateOptions;
    const throughputCost =
      estimateTokenCount(prompt) + estimateTokenCount(requestOptions.system ?? "");

    return gate.invoke(() => client.generate(prompt, requestOptions), {
      throughputCost,
      timeoutMs,
      signal: requestOptions.signal,
      onAttempt,
      label: `generate(${client.model})`,
    });
  };

  const safeGenerate = async (
    prompt: string,
    fallback: string,
    generateOptions?: GuardedGenerateOptions,
  ): Promise<string> => {
    try {
      return await generate(prompt, generateOptions);
    } catch (error) {
      logger?.error("Inference failed, returning fallback", toError(error), {
        reason: describeCallError(error),
      });
      return fallback;
    }
  };

  return {
    model: client.model,
    generate,
    safeGenerate,
    getMetrics: gate.getMetrics,
    getAvailableBudget: gate.getAvailableBudget,
  };
};
