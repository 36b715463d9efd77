/**
 * Inference adapter error types and failure classification.
 */

import * as v from "valibot";

import type { FailureKind } from "@/lib/rate-limiter/retry-controller";
import { isCallError } from "@/lib/rate-limiter/errors";

/**
 * Non-2xx response from the inference server.
 */
export class InferenceHttpError extends Error {
  public override readonly name = "InferenceHttpError";

  constructor(
    message: string,
    public readonly status: number,
    /** Server-suggested delay from a Retry-After header, if any */
    public readonly retryAfterMs: number | null = null,
  ) {
    super(message);
  }
}

/**
 * 2xx response whose body did not match the expected shape.
 */
export class InferenceResponseError extends Error {
  public override readonly name = "InferenceResponseError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Parses Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @param nowMs - Wall-clock reference for HTTP dates
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2025 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (value: string | null, nowMs = Date.now()): number | null => {
  if (!value) {
    return null;
  }

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - nowMs);
  }

  return null;
};

/**
 * HTTP status codes that indicate retryable errors.
 */
export const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * HTTP status codes that indicate non-retryable errors.
 */
export const NON_RETRYABLE_STATUS_CODES = new Set([
  400, // Bad Request
  401, // Unauthorized
  403, // Forbidden
  404, // Not Found (unknown model)
  422, // Unprocessable Entity
]);

/**
 * Network error codes that indicate retryable errors.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Error names raised by fetch when a signal fires. A caller-side abort is
 * turned into cancellation by the retry controller before the next attempt.
 */
const ABORT_ERROR_NAMES = new Set(["TimeoutError", "AbortError"]);

/**
 * Error message patterns that indicate non-retryable errors.
 */
const NON_RETRYABLE_PATTERNS = ["invalid api key", "model not found", "validation error"];

/**
 * Extracts HTTP status code from an error object without type casts.
 */
const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
};

/**
 * Network code on the error or on its cause (undici wraps socket errors in
 * `TypeError: fetch failed`).
 */
const getNetworkCode = (err: object): string | undefined => {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  if ("cause" in err && err.cause !== null && typeof err.cause === "object") {
    return getNetworkCode(err.cause);
  }
  return undefined;
};

/**
 * Classifies an inference failure for the retry controller.
 *
 * Transient:
 * - 408, 429 and 5xx responses
 * - Network errors (ECONNRESET, ETIMEDOUT, etc.)
 * - Request timeouts and aborts
 * - Anything unrecognised
 *
 * Permanent:
 * - 400/401/403/404/422 responses
 * - Malformed response bodies
 * - Terminal errors of this library (a nested gate already gave up)
 *
 * @example
 * ```typescript
 * const gate = createCallGate({ ...config, classify: classifyInferenceError });
 * ```
 */
export const classifyInferenceError = (error: unknown): FailureKind => {
  if (isCallError(error)) {
    return "permanent";
  }

  if (error instanceof InferenceResponseError || v.isValiError(error)) {
    return "permanent";
  }

  if (error !== null && typeof error === "object") {
    if ("name" in error && typeof error.name === "string" && ABORT_ERROR_NAMES.has(error.name)) {
      return "transient";
    }

    const statusCode = getStatusCode(error);
    if (statusCode !== undefined) {
      if (NON_RETRYABLE_STATUS_CODES.has(statusCode)) {
        return "permanent";
      }
      if (RETRYABLE_STATUS_CODES.has(statusCode) || statusCode >= 500) {
        return "transient";
      }
    }

    const code = getNetworkCode(error);
    if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
      return "transient";
    }

    if ("message" in error && typeof error.message === "string") {
      const message = error.message.toLowerCase();
      if (NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
        return "permanent";
      }
    }
  }

  // Default to retryable for unknown errors
  return "transient";
};
