import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const numberFromString = v.pipe(v.string(), v.transform(Number), v.number());

const positiveNumber = v.pipe(numberFromString, v.gtValue(0));

const booleanFromString = v.pipe(
  v.picklist(["true", "false", "1", "0"]),
  v.transform((value) => value === "true" || value === "1"),
);

export const envSchema = v.pipe(
  v.object({
    // Runtime
    NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

    // Logging
    LOG_LEVEL: v.optional(logLevelSchema),

    // Rate limiting
    RATE_LIMITING_ENABLED: v.optional(booleanFromString, "true"),
    MAX_REQUESTS_PER_MINUTE: v.optional(positiveNumber, "60"),
    MAX_TOKENS_PER_MINUTE: v.optional(positiveNumber, "90000"),
    RATE_LIMIT_TIMEOUT_SECONDS: v.optional(positiveNumber),

    // Retry
    RETRY_MAX_ATTEMPTS: v.optional(v.pipe(numberFromString, v.integer(), v.minValue(1)), "3"),
    RETRY_MIN_WAIT_SECONDS: v.optional(v.pipe(numberFromString, v.minValue(0)), "2"),
    RETRY_MAX_WAIT_SECONDS: v.optional(v.pipe(numberFromString, v.minValue(0)), "10"),
    RETRY_MULTIPLIER: v.optional(v.pipe(numberFromString, v.gtValue(1)), "2"),

    // Inference service (Ollama)
    OLLAMA_BASE_URL: v.optional(v.pipe(v.string(), v.url()), "http://localhost:11434"),
    OLLAMA_MODEL: v.optional(v.pipe(v.string(), v.minLength(1)), "llama3.2:latest"),
    OLLAMA_TIMEOUT_SECONDS: v.optional(positiveNumber, "120"),
  }),
  v.check(
    (env) => env.RETRY_MIN_WAIT_SECONDS <= env.RETRY_MAX_WAIT_SECONDS,
    "RETRY_MIN_WAIT_SECONDS must not exceed RETRY_MAX_WAIT_SECONDS",
  ),
);

export type Env = v.InferOutput<typeof envSchema>;
