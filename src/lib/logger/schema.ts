import * as v from "valibot";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const logLevelSchema = v.picklist(LOG_LEVELS);

export type LogLevel = v.InferOutput<typeof logLevelSchema>;
