import { Context, Effect, Layer } from "effect";
import { log } from "../logging/logger.ts";
import type { LogContext } from "../logging/types.ts";

// Logger Service
export class LoggerService extends Context.Tag("LoggerService")<
  LoggerService,
  {
    readonly info: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly warn: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly error: (tag: string, msg: string, err?: unknown, ctx?: LogContext) => Effect.Effect<void>;
    readonly debug: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
  }
>() {}

// Live implementation

export const LiveLoggerService = Layer.succeed(LoggerService, {
  info: (tag, msg, ctx) => Effect.sync(() => log.info(tag, msg, ctx)),
  warn: (tag, msg, ctx) => Effect.sync(() => log.warn(tag, msg, ctx)),
  error: (tag, msg, err, ctx) => Effect.sync(() => log.error(tag, msg, err, ctx)),
  debug: (tag, msg, ctx) => Effect.sync(() => log.debug(tag, msg, ctx)),
});
