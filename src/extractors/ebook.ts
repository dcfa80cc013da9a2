import type { EbookMetadataDecoder, Extractor, ExtractorRegistration } from "./types.ts";
import { normalizeTags, opfDialect } from "../dialects/index.ts";
import { buildRecord, hasData } from "../record.ts";
import { loadEbookMetadataDecoder } from "../decoders/opf.ts";
import { log } from "../logging/logger.ts";
import { claims, guardDecode } from "./common.ts";

const TAG = "EbookExtractor";

export const EBOOK_EXTENSIONS: ReadonlySet<string> = new Set(["epub"]);

export function createEbookExtractor(decoder: EbookMetadataDecoder | null): Extractor {
  return {
    name: "ebook",
    available: decoder !== null,

    supports(_filePath, extension) {
      return decoder !== null && claims(EBOOK_EXTENSIONS, extension);
    },

    async extract(filePath) {
      if (!decoder) return null;

      const metadata = await guardDecode(TAG, filePath, "ebook", () => decoder.decode(filePath));
      if (!metadata) return null;

      const tags = normalizeTags(metadata, opfDialect);
      const record = buildRecord({
        container: "epub",
        tagFormat: "opf",
        fields: tags.fields,
        hasCoverArt: tags.hasCoverArt,
      });
      if (!hasData(record)) return null;

      log.debug(TAG, "Extracted", { file: filePath, fields_count: Object.keys(record.fields).length });
      return record;
    },
  };
}

export const ebookExtractorRegistration: ExtractorRegistration = {
  name: "ebook",
  load: async () => createEbookExtractor(await loadEbookMetadataDecoder()),
};
