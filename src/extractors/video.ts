import type { Extractor, ExtractorRegistration, MediaTrack, VideoContainerDecoder } from "./types.ts";
import type { TagMap } from "../dialects/types.ts";
import { countMenuChapters, generalDialect, normalizeTags } from "../dialects/index.ts";
import { buildRecord, containerFromPath, hasData } from "../record.ts";
import { loadVideoContainerDecoder } from "../decoders/mediainfo.ts";
import { log } from "../logging/logger.ts";
import { claims, guardDecode } from "./common.ts";

const TAG = "VideoExtractor";

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(["mkv", "webm", "mp4", "m4v", "mov"]);

const MATROSKA_CONTAINERS: ReadonlySet<string> = new Set(["mkv", "webm"]);

function toTagMap(track: MediaTrack): TagMap {
  return Object.fromEntries(Object.entries(track.attributes).map(([key, value]) => [key, [value]]));
}

/** Seconds from a number or a numeric string ("5400.032") */
export function parseSeconds(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

function countChapters(tracks: readonly MediaTrack[]): number {
  return tracks
    .filter((track) => track.type === "Menu")
    .reduce((sum, track) => sum + countMenuChapters(toTagMap(track)), 0);
}

export function createVideoContainerExtractor(decoder: VideoContainerDecoder | null): Extractor {
  return {
    name: "video",
    available: decoder !== null,

    supports(_filePath, extension) {
      return decoder !== null && claims(VIDEO_EXTENSIONS, extension);
    },

    async extract(filePath) {
      if (!decoder) return null;

      const tracks = await guardDecode(TAG, filePath, "video", () => decoder.decode(filePath));
      if (!tracks) return null;

      const general = tracks.find((track) => track.type === "General");
      if (!general) return null;

      const container = containerFromPath(filePath);
      const tags = normalizeTags(toTagMap(general), generalDialect);

      const record = buildRecord({
        container,
        tagFormat: MATROSKA_CONTAINERS.has(container) ? "matroska" : "mp4",
        fields: tags.fields,
        durationSeconds: parseSeconds(general.attributes.duration),
        chapters: countChapters(tracks),
        hasCoverArt: tags.hasCoverArt,
      });
      if (!hasData(record)) return null;

      log.debug(TAG, "Extracted", {
        file: filePath,
        container,
        tag_format: record.tagFormat,
        fields_count: Object.keys(record.fields).length,
      });
      return record;
    },
  };
}

export const videoExtractorRegistration: ExtractorRegistration = {
  name: "video",
  load: async () => createVideoContainerExtractor(await loadVideoContainerDecoder()),
};
