/**
 * Ollama inference client (`POST /api/generate`, non-streaming).
 */

import * as v from "valibot";

import type { Logger } from "@/lib/logger";

import { InferenceHttpError, InferenceResponseError, parseRetryAfterMs } from "../errors";
import type { GenerateOptions, InferenceClient } from "../types";
import { errorResponseSchema, generateResponseSchema } from "./schemas";

export interface OllamaClientConfig {
  baseUrl: string;
  model: string;
  /** Per-request timeout; each retry attempt gets its own */
  requestTimeoutMs: number;
  logger?: Logger;
}

interface GenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  system?: string;
  options?: { temperature: number };
}

const formatIssue = (issue: v.BaseIssue<unknown>): string => {
  const path = issue.path?.map((item) => String(item.key)).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

const readErrorDetail = async (res: Response): Promise<string> => {
  const body = await res.text();
  try {
    const parsed = v.safeParse(errorResponseSchema, JSON.parse(body));
    return parsed.success ? parsed.output.error : body;
  } catch {
    return body;
  }
};

const readJson = async (res: Response): Promise<unknown> => {
  try {
    const data: unknown = await res.json();
    return data;
  } catch (error) {
    throw new InferenceResponseError("Ollama returned a non-JSON response body", [], error);
  }
};

/**
 * Creates an Ollama client.
 *
 * @example
 * ```typescript
 * const ollama = createOllamaClient({
 *   baseUrl: "http://localhost:11434",
 *   model: "llama3.2:latest",
 *   requestTimeoutMs: 120_000,
 * });
 *
 * const text = await ollama.generate("Summarise this paragraph: ...");
 * ```
 */
export const createOllamaClient = (config: OllamaClientConfig): InferenceClient => {
  const { model, requestTimeoutMs, logger } = config;
  const url = `${config.baseUrl.replace(/\/$/, "")}/api/generate`;

  const generate = async (prompt: string, options: GenerateOptions = {}): Promise<string> => {
    const timeout = AbortSignal.timeout(requestTimeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const body: GenerateRequest = { model, prompt, stream: false };
    if (options.system !== undefined) {
      body.system = options.system;
    }
    if (options.temperature !== undefined) {
      body.options = { temperature: options.temperature };
    }

    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const detail = await readErrorDetail(res);
      throw new InferenceHttpError(
        `Ollama generate failed: ${res.status} ${detail || res.statusText}`,
        res.status,
        parseRetryAfterMs(res.headers.get("retry-after")),
      );
    }

    const parsed = v.safeParse(generateResponseSchema, await readJson(res));
    if (!parsed.success) {
      throw new InferenceResponseError(
        "Ollama returned an unexpected response shape",
        parsed.issues.map(formatIssue),
      );
    }

    logger?.debug("Inference request completed", {
      model: parsed.output.model,
      promptTokens: parsed.output.prompt_eval_count,
      completionTokens: parsed.output.eval_count,
    });

    return parsed.output.response;
  };

  return { model, generate };
};
