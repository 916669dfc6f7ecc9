export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export type EmittedLogLevel = Exclude<LogLevel, "silent">;

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  readonly level: LogLevel;

  child(context: LogContext): Logger;
  isLevelEnabled(level: LogLevel): boolean;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function normalizeLogLevel(raw?: string | null, fallback: LogLevel = "warn"): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function isLogLevelEnabled(current: LogLevel, target: LogLevel): boolean {
  if (target === "silent") {
    return false;
  }
  return LOG_LEVELS.indexOf(target) <= LOG_LEVELS.indexOf(current);
}
