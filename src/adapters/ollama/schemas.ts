import * as v from "valibot";

export const generateResponseSchema = v.object({
  model: v.string(),
  response: v.string(),
  done: v.boolean(),
  prompt_eval_count: v.optional(v.number()),
  eval_count: v.optional(v.number()),
});

export const errorResponseSchema = v.object({
  error: v.string(),
});

export type GenerateResponse = v.InferOutput<typeof generateResponseSchema>;
