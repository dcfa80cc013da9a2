import type { LogLevel, LogEntry, LogContext } from "./types.ts";
import { LOG_LEVELS } from "./types.ts";
import { config, configWarnings } from "../config.ts";

const currentLevel: LogLevel = config.logLevel;

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

function emit(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  if (entry.level === "error" || entry.level === "warn") {
    console.error(output);
  } else {
    console.log(output);
  }
}

export function errorContext(err: unknown, ctx?: LogContext): LogContext {
  const errorCtx: LogContext = { ...ctx };
  if (err instanceof Error) {
    errorCtx.error = err.message;
    errorCtx.error_stack = err.stack;
  } else if (typeof err === "string") {
    errorCtx.error = err;
  } else if (err !== undefined && err !== null) {
    errorCtx.error = JSON.stringify(err);
  }
  return errorCtx;
}

export const log = {
  debug(tag: string, msg: string, ctx?: LogContext): void {
    if (!shouldLog("debug")) return;
    emit({ ts: new Date().toISOString(), level: "debug", tag, msg, ...ctx });
  },

  info(tag: string, msg: string, ctx?: LogContext): void {
    if (!shouldLog("info")) return;
    emit({ ts: new Date().toISOString(), level: "info", tag, msg, ...ctx });
  },

  warn(tag: string, msg: string, ctx?: LogContext): void {
    if (!shouldLog("warn")) return;
    emit({ ts: new Date().toISOString(), level: "warn", tag, msg, ...ctx });
  },

  error(tag: string, msg: string, err?: unknown, ctx?: LogContext): void {
    if (!shouldLog("error")) return;
    emit({ ts: new Date().toISOString(), level: "error", tag, msg, ...errorContext(err, ctx) });
  },
};

for (const warning of configWarnings) {
  log.warn("Config", "Invalid setting, using default", errorContext(warning));
}
