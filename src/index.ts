/**
 * inference-call-guard
 *
 * Rate limiting and retry for calls to rate-limited inference APIs.
 */

export * from "./lib/rate-limiter";
export * from "./adapters";
export * from "./client";

export { createInvocationQueue } from "./worker/queue";
export type {
  InvocationQueue,
  InvocationQueueConfig,
  JobHandle,
  JobStatus,
  SubmitOptions,
} from "./worker/queue";

export { createManualClock, systemClock } from "./lib/clock";
export type { Clock, ManualClock } from "./lib/clock";

export { createConfig } from "./lib/config";
export type { AppConfig, OllamaConfig, RateLimitingConfig, RetryConfig } from "./lib/config";

export { ConfigValidationError, getEnv, parseEnv } from "./lib/env";
export type { Env } from "./lib/env";

export { createLogger } from "./lib/logger";
export type { LogContext, Logger, LoggerConfig, LogLevel, LogSink } from "./lib/logger";
