import { config } from "../config";

import type { LogLevel } from "./schema";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/** Receives each formatted line. Defaults to the console. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  /** Fields merged into every entry's context */
  bindings?: LogContext;
  sink?: LogSink;
  /** Human-readable lines instead of JSON */
  pretty?: boolean;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  child: (bindings: LogContext) => Logger;
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const mergeContext = (bindings?: LogContext, context?: LogContext): LogContext | undefined => {
  if (!bindings || Object.keys(bindings).length === 0) {
    return context;
  }
  return { ...bindings, ...context };
};

export const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

export const formatLog = (entry: LogEntry, pretty: boolean): string => {
  if (pretty) {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` (${entry.error.name}: ${entry.error.message})` : ""}`;
  }
  return JSON.stringify(entry);
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createLogger = (
  loggerConfig: LoggerConfig = {
    level: config.logging.level,
    pretty: config.logging.pretty,
  },
): Logger => {
  const { level, bindings, sink = consoleSink, pretty = false } = loggerConfig;

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) {
      return;
    }
    const entry = createLogEntry(entryLevel, message, mergeContext(bindings, context), error);
    sink(entryLevel, formatLog(entry, pretty));
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (childBindings) =>
      createLogger({
        ...loggerConfig,
        bindings: { ...bindings, ...childBindings },
      }),
  };
};

export const logger = createLogger();
