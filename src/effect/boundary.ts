import { Effect } from "effect";
import { LoggerService } from "./services.ts";
import { ExtractorFaultError } from "../utils/errors.ts";

export interface IsolationContext {
  /** Log tag of the caller */
  tag: string;
  extractor: string;
  file: string;
}

/**
 * Runs one extractor call. A throw or rejection becomes an
 * `ExtractorFaultError`, is logged, and is replaced by `fallback`.
 */
export const isolate = <A>(
  run: () => Promise<A>,
  fallback: A,
  context: IsolationContext,
): Effect.Effect<A, never, LoggerService> =>
  Effect.tryPromise({
    try: () => run(),
    catch: (error) => new ExtractorFaultError(context.extractor, context.file, error),
  }).pipe(
    Effect.catchAll((fault) =>
      Effect.gen(function* () {
        const logger = yield* LoggerService;
        yield* logger.error(context.tag, fault.message, fault.originalError, {
          file: context.file,
          extractor: fault.extractor,
        });
        return fallback;
      }),
    ),
  );
