import { type Env, getEnv } from "./env/env";
import type { LogLevel } from "./logger/schema";

export interface RateLimitingConfig {
  /** When false, calls skip the limiter entirely */
  enabled: boolean;
  maxRequestsPerMinute: number;
  maxTokensPerMinute: number;
  /** Default bound on how long a call may wait for budget */
  acquireTimeoutMs?: number;
}

export interface RetryConfig {
  maxAttempts: number;
  minWaitMs: number;
  maxWaitMs: number;
  multiplier: number;
}

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  rateLimiting: RateLimitingConfig;
  retry: RetryConfig;
  ollama: OllamaConfig;
}

const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);

export const createConfig = (env: Env): AppConfig => ({
  nodeEnv: env.NODE_ENV,
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    pretty: env.NODE_ENV === "development",
  },
  rateLimiting: {
    enabled: env.RATE_LIMITING_ENABLED,
    maxRequestsPerMinute: env.MAX_REQUESTS_PER_MINUTE,
    maxTokensPerMinute: env.MAX_TOKENS_PER_MINUTE,
    ...(env.RATE_LIMIT_TIMEOUT_SECONDS !== undefined && {
      acquireTimeoutMs: secondsToMs(env.RATE_LIMIT_TIMEOUT_SECONDS),
    }),
  },
  retry: {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    minWaitMs: secondsToMs(env.RETRY_MIN_WAIT_SECONDS),
    maxWaitMs: secondsToMs(env.RETRY_MAX_WAIT_SECONDS),
    multiplier: env.RETRY_MULTIPLIER,
  },
  ollama: {
    baseUrl: env.OLLAMA_BASE_URL,
    model: env.OLLAMA_MODEL,
    requestTimeoutMs: secondsToMs(env.OLLAMA_TIMEOUT_SECONDS),
  },
});

export const config: AppConfig = createConfig(getEnv());
