/**
 * Inference adapter exports.
 */

export type { GenerateOptions, InferenceClient } from "./types";

export {
  classifyInferenceError,
  InferenceHttpError,
  InferenceResponseError,
  NON_RETRYABLE_STATUS_CODES,
  parseRetryAfterMs,
  RETRYABLE_STATUS_CODES,
} from "./errors";

export { CHARS_PER_TOKEN, estimateTokenCount } from "./cost";

export { createOllamaClient, type OllamaClientConfig } from "./ollama";
