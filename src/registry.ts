import { Effect } from "effect";
import type { NormalizedRecord } from "./types.ts";
import type { EbookMetadataDecoder, Extractor, TaggedAudioDecoder, VideoContainerDecoder } from "./extractors/types.ts";
import {
  createEbookExtractor,
  createTaggedAudioExtractor,
  createVideoContainerExtractor,
  loadExtractors,
} from "./extractors/index.ts";
import { EXTRACTOR_NAMES, config } from "./config.ts";
import type { ExtractorName } from "./config.ts";
import { LiveLoggerService, LoggerService } from "./effect/services.ts";
import { isolate } from "./effect/boundary.ts";
import { hasData } from "./record.ts";
import { log } from "./logging/logger.ts";

const TAG = "Registry";

/**
 * Tries extractors in order and returns the first record with data.
 * Later extractors are never consulted once one matches, and results are
 * never merged.
 */
export class ExtractorRegistry {
  private readonly extractors: readonly Extractor[];

  constructor(extractors: Iterable<Extractor>) {
    this.extractors = [...extractors];
  }

  get names(): string[] {
    return this.extractors.map((extractor) => extractor.name);
  }

  extractEffect(
    filePath: string,
    extension: string,
    mime?: string,
  ): Effect.Effect<NormalizedRecord | null, never, LoggerService> {
    const extractors = this.extractors;

    return Effect.gen(function* () {
      const logger = yield* LoggerService;

      for (const extractor of extractors) {
        const context = { tag: TAG, extractor: extractor.name, file: filePath };

        const applies = yield* isolate(async () => extractor.supports(filePath, extension, mime), false, context);
        if (!applies) continue;

        const record = yield* isolate(() => extractor.extract(filePath), null, context);
        if (record && hasData(record)) {
          yield* logger.debug(TAG, "Matched", {
            file: filePath,
            extractor: extractor.name,
            tag_format: record.tagFormat,
          });
          return record;
        }
      }

      yield* logger.debug(TAG, "No metadata", { file: filePath, extension });
      return null;
    });
  }

  extract(filePath: string, extension: string, mime?: string): Promise<NormalizedRecord | null> {
    return Effect.runPromise(this.extractEffect(filePath, extension, mime).pipe(Effect.provide(LiveLoggerService)));
  }
}

export interface RegistryDecoders {
  audio?: TaggedAudioDecoder | null;
  video?: VideoContainerDecoder | null;
  ebook?: EbookMetadataDecoder | null;
}

/** Builds the extractors from injected decoders; a missing decoder is an unavailable capability */
export function createRegistry(
  decoders: RegistryDecoders,
  order: readonly ExtractorName[] = EXTRACTOR_NAMES,
): ExtractorRegistry {
  const factories: Record<ExtractorName, () => Extractor> = {
    audio: () => createTaggedAudioExtractor(decoders.audio ?? null),
    video: () => createVideoContainerExtractor(decoders.video ?? null),
    ebook: () => createEbookExtractor(decoders.ebook ?? null),
  };
  return new ExtractorRegistry(order.map((name) => factories[name]()));
}

export interface DefaultRegistryOptions {
  /** Defaults to TAGNORM_EXTRACTORS */
  extractors?: readonly ExtractorName[];
}

export async function buildDefaultRegistry(options: DefaultRegistryOptions = {}): Promise<ExtractorRegistry> {
  const { extractors: names = config.extractors } = options;
  const extractors = await loadExtractors(names);

  log.info(TAG, "Extractors ready", {
    extractors: extractors.filter((extractor) => extractor.available).map((extractor) => extractor.name),
  });

  return new ExtractorRegistry(extractors);
}
