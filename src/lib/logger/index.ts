export {
  createLogEntry,
  createLogger,
  formatLog,
  logger,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogSink,
} from "./logger";

export { LOG_LEVELS, logLevelSchema, type LogLevel } from "./schema";
