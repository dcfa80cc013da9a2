export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogContext {
  // Input context
  file?: string;
  extension?: string;
  mime?: string;

  // Extractor context
  extractor?: string;
  extractors?: string[];
  tag_format?: string;
  container?: string;
  fields_count?: number;
  duration_ms?: number;

  // Capability context
  capability?: string;
  tool?: string;
  timeout_ms?: number;

  // Error context
  error?: string;
  error_stack?: string;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
