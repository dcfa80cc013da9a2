import type { Extractor, ExtractorRegistration, TaggedAudioDecoder } from "./types.ts";
import type { NormalizedTags } from "../dialects/types.ts";
import { AUDIO_DIALECTS, normalizeTags } from "../dialects/index.ts";
import { buildRecord, containerFromPath, hasData } from "../record.ts";
import { loadTaggedAudioDecoder } from "../decoders/music-metadata.ts";
import { log } from "../logging/logger.ts";
import { claims, guardDecode } from "./common.ts";

const TAG = "AudioExtractor";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  "mp3",
  "m4a",
  "m4b",
  "mp4",
  "flac",
  "ogg",
  "opus",
  "ape",
  "wav",
  "mov",
]);

export function createTaggedAudioExtractor(decoder: TaggedAudioDecoder | null): Extractor {
  return {
    name: "audio",
    available: decoder !== null,

    supports(_filePath, extension) {
      return decoder !== null && claims(AUDIO_EXTENSIONS, extension);
    },

    async extract(filePath) {
      if (!decoder) return null;

      const decoded = await guardDecode(TAG, filePath, "audio", () => decoder.decode(filePath));
      if (!decoded) return null;

      const dialect = AUDIO_DIALECTS[decoded.dialect];
      const tags: NormalizedTags = dialect ? normalizeTags(decoded.tags, dialect) : { fields: {} };

      const record = buildRecord({
        container: containerFromPath(filePath),
        tagFormat: decoded.dialect,
        fields: tags.fields,
        durationSeconds: decoded.durationSeconds,
        chapters: tags.chapters,
        hasCoverArt: tags.hasCoverArt,
      });
      if (!hasData(record)) return null;

      log.debug(TAG, "Extracted", {
        file: filePath,
        tag_format: record.tagFormat,
        fields_count: Object.keys(record.fields).length,
      });
      return record;
    },
  };
}

export const audioExtractorRegistration: ExtractorRegistration = {
  name: "audio",
  load: async () => createTaggedAudioExtractor(await loadTaggedAudioDecoder()),
};
