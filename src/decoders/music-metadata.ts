import type { DecodedAudio, TaggedAudioDecoder } from "../extractors/types.ts";
import type { TagMap } from "../dialects/types.ts";
import type { AudioDialect } from "../types.ts";
import { log, errorContext } from "../logging/logger.ts";

interface NativeTag {
  id: string;
  value: unknown;
}

/** The slice of music-metadata's parse result the adapter reads */
export interface NativeAudioMetadata {
  format: { container?: string; duration?: number };
  native: Readonly<Record<string, readonly NativeTag[]>>;
}

/** Native tag type -> dialect, preferred first */
const TAG_TYPE_DIALECTS: ReadonlyArray<readonly [string, AudioDialect]> = [
  ["ID3v2.4", "id3"],
  ["ID3v2.3", "id3"],
  ["ID3v2.2", "id3"],
  ["iTunes", "mp4"],
  ["vorbis", "vorbis"],
  ["APEv2", "ape"],
  ["exif", "riff"],
  ["ID3v1", "id3"],
];

// Untagged files report the tag format native to their container
const CONTAINER_DIALECTS: ReadonlyArray<readonly [RegExp, AudioDialect]> = [
  [/^mpeg$/i, "id3"],
  [/^(m4a|m4b|mp4|mp42|isom|qt)\b/i, "mp4"],
  [/^(flac|ogg)$/i, "vorbis"],
  [/^monkey's audio$/i, "ape"],
  [/^wave$/i, "riff"],
];

function containerDialect(container: string | undefined): AudioDialect {
  if (!container) return "unknown";
  const trimmed = container.trim();
  return CONTAINER_DIALECTS.find(([pattern]) => pattern.test(trimmed))?.[1] ?? "unknown";
}

// ID3v1 fields surfaced under their ID3v2 frame ids
const ID3V1_FRAMES: Readonly<Record<string, string>> = {
  title: "TIT2",
  artist: "TPE1",
  album: "TALB",
  year: "TYER",
  comment: "COMM",
  track: "TRCK",
  genre: "TCON",
};

function groupTags(tags: readonly NativeTag[], rename?: Readonly<Record<string, string>>): TagMap {
  const grouped: Record<string, unknown[]> = {};
  for (const { id, value } of tags) {
    const key = rename?.[id] ?? id;
    (grouped[key] ??= []).push(value);
  }
  return grouped;
}

export function toDecodedAudio(metadata: NativeAudioMetadata): DecodedAudio {
  const durationSeconds = metadata.format.duration;

  for (const [tagType, dialect] of TAG_TYPE_DIALECTS) {
    const tags = metadata.native[tagType];
    if (!tags || tags.length === 0) continue;

    const rename = tagType === "ID3v1" ? ID3V1_FRAMES : undefined;
    return { dialect, tags: groupTags(tags, rename), durationSeconds };
  }

  return { dialect: containerDialect(metadata.format.container), tags: {}, durationSeconds };
}

export async function loadTaggedAudioDecoder(): Promise<TaggedAudioDecoder | null> {
  const mm = await import("music-metadata").catch((error: unknown) => {
    log.debug("AudioDecoder", "music-metadata not available", errorContext(error, { capability: "music-metadata" }));
    return null;
  });
  if (!mm) return null;

  return {
    async decode(filePath) {
      const metadata = await mm.parseFile(filePath);
      return toDecodedAudio(metadata);
    },
  };
}
