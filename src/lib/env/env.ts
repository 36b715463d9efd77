import * as v from "valibot";

import { type Env, envSchema } from "./schema";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

const formatIssue = (issue: v.BaseIssue<unknown>): string => {
  const path = issue.path?.map((item) => String(item.key)).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    const issues = result.issues.map(formatIssue);
    throw new ConfigValidationError(
      `Environment variable validation failed:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      issues,
    );
  }
  return result.output;
};

let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export type { Env } from "./schema";
