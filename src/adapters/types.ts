/**
 * Inference adapter interface.
 */

export interface GenerateOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
  /** System prompt */
  system?: string;
  /** Sampling temperature passed to the model */
  temperature?: number;
}

export interface InferenceClient {
  readonly model: string;
  /** Returns the model's completion for `prompt` */
  generate: (prompt: string, options?: GenerateOptions) => Promise<string>;
}
