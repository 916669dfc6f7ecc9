export type { EmittedLogLevel, LogContext, Logger, LogLevel } from "./domain/logger.js";
export { isLogLevelEnabled, normalizeLogLevel } from "./domain/logger.js";
export { StructuredLogger, createNoopLogger, type LogRecord } from "./application/structured-logger.js";
