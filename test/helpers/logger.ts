import { Effect, Layer } from "effect";
import { LoggerService } from "../../src/effect/services.ts";
import type { LogContext, LogLevel } from "../../src/logging/types.ts";

export interface LoggedCall {
  level: LogLevel;
  tag: string;
  msg: string;
  err?: unknown;
  ctx?: LogContext;
}

/** LoggerService layer that keeps every call in memory */
export function createRecordingLogger(): { calls: LoggedCall[]; layer: Layer.Layer<LoggerService> } {
  const calls: LoggedCall[] = [];
  const layer = Layer.succeed(LoggerService, {
    info: (tag, msg, ctx) => Effect.sync(() => void calls.push({ level: "info", tag, msg, ctx })),
    warn: (tag, msg, ctx) => Effect.sync(() => void calls.push({ level: "warn", tag, msg, ctx })),
    error: (tag, msg, err, ctx) => Effect.sync(() => void calls.push({ level: "error", tag, msg, err, ctx })),
    debug: (tag, msg, ctx) => Effect.sync(() => void calls.push({ level: "debug", tag, msg, ctx })),
  });
  return { calls, layer };
}
