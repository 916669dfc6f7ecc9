import { StructuredLogger, createNoopLogger, normalizeLogLevel, type LogRecord } from "../../core/logging/index.js";
import type { LogLevel, Logger } from "../../core/logging/index.js";

export type NodeLogFormat = "pretty" | "json";

export interface NodeLoggerConfig {
  level?: LogLevel;
  format?: NodeLogFormat;
  stream?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

export function createNodeLogger(config: NodeLoggerConfig = {}): Logger {
  const env = config.env ?? process.env;
  const level = config.level ?? normalizeLogLevel(env.DOCS_PREVIEW_LOG_LEVEL, "warn");
  if (level === "silent") {
    return createNoopLogger();
  }

  const format = config.format ?? resolveLogFormat(env.DOCS_PREVIEW_LOG_FORMAT);
  const stream = config.stream ?? process.stderr;

  return new StructuredLogger({
    level,
    sink: (record) => {
      stream.write(renderRecord(record, format));
    }
  });
}

function resolveLogFormat(raw: string | undefined): NodeLogFormat {
  return raw?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

// [ts] LEVEL scope message {"context":...}
export function renderRecord(record: LogRecord, format: NodeLogFormat): string {
  if (format === "json") {
    return `${JSON.stringify(record)}\n`;
  }

  const level = record.level.toUpperCase().padEnd(5, " ");
  const scope = record.scope ? ` ${record.scope}` : "";
  const details = record.context ? ` ${JSON.stringify(record.context)}` : "";
  return `[${record.timestamp}] ${level}${scope} ${record.message}${details}\n`;
}
