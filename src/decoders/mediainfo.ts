import { Schema } from "@effect/schema";
import { Either } from "effect";
import { open } from "node:fs/promises";
import type { MediaTrack, VideoContainerDecoder } from "../extractors/types.ts";
import { log, errorContext } from "../logging/logger.ts";

const RawTrack = Schema.Record({ key: Schema.String, value: Schema.Unknown });

// mediainfo.js result in "object" format
export const MediaInfoResult = Schema.Struct({
  media: Schema.optional(
    Schema.NullOr(
      Schema.Struct({
        track: Schema.Array(RawTrack),
      }),
    ),
  ),
});

export type MediaInfoResult = typeof MediaInfoResult.Type;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function flattenAttributes(track: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(track)) {
    if (key === "@type") continue;
    if (key === "extra" && isPlainObject(value)) {
      for (const [extraKey, extraValue] of Object.entries(value)) {
        attributes[extraKey.toLowerCase()] = extraValue;
      }
      continue;
    }
    attributes[key.toLowerCase()] = value;
  }

  return attributes;
}

export function toMediaTracks(result: unknown): MediaTrack[] | null {
  const decoded = Schema.decodeUnknownEither(MediaInfoResult)(result);
  if (Either.isLeft(decoded)) return null;

  const tracks = decoded.right.media?.track ?? [];
  return tracks.map((track) => {
    const type = track["@type"];
    return {
      type: typeof type === "string" ? type : "",
      attributes: flattenAttributes(track),
    };
  });
}

export async function loadVideoContainerDecoder(): Promise<VideoContainerDecoder | null> {
  const module = await import("mediainfo.js").catch((error: unknown) => {
    log.debug("VideoDecoder", "mediainfo.js not available", errorContext(error, { capability: "mediainfo.js" }));
    return null;
  });
  if (!module) return null;

  const mediaInfoFactory = module.default;

  // One trial start of the WASM binding; it either loads now or never
  const probe = await mediaInfoFactory({ format: "object" }).catch((error: unknown) => {
    log.debug("VideoDecoder", "mediainfo.js failed to start", errorContext(error, { capability: "mediainfo.js" }));
    return null;
  });
  if (!probe) return null;
  probe.close();

  return {
    async decode(filePath) {
      const handle = await open(filePath, "r");
      try {
        const { size } = await handle.stat();
        const mediainfo = await mediaInfoFactory({ format: "object" });
        try {
          const result: unknown = await mediainfo.analyzeData(
            () => size,
            async (chunkSize: number, offset: number) => {
              const buffer = new Uint8Array(chunkSize);
              const { bytesRead } = await handle.read(buffer, 0, chunkSize, offset);
              return buffer.subarray(0, bytesRead);
            },
          );
          return toMediaTracks(result);
        } finally {
          mediainfo.close();
        }
      } finally {
        await handle.close();
      }
    },
  };
}
