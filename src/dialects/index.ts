import type { AudioDialect } from "../types.ts";
import type { DialectDefinition } from "./types.ts";
import { id3Dialect } from "./id3.ts";
import { mp4Dialect } from "./mp4.ts";
import { vorbisDialect, apeDialect } from "./vorbis.ts";
import { riffDialect } from "./riff.ts";

export const AUDIO_DIALECTS: Readonly<Record<AudioDialect, DialectDefinition | null>> = {
  id3: id3Dialect,
  mp4: mp4Dialect,
  vorbis: vorbisDialect,
  ape: apeDialect,
  riff: riffDialect,
  unknown: null,
};

export { mapFields, normalizeTags, valueToText, unwrapValue } from "./common.ts";
export { generalDialect, countMenuChapters, GENERAL_FIELDS } from "./general.ts";
export { opfDialect, OPF_FIELDS, OPF_META_KEY, OPF_ITEM_KEY } from "./opf.ts";
export { id3Dialect, ID3_FIELDS } from "./id3.ts";
export { mp4Dialect, MP4_FIELDS } from "./mp4.ts";
export { vorbisDialect, apeDialect, VORBIS_FIELDS } from "./vorbis.ts";
export { riffDialect, RIFF_FIELDS } from "./riff.ts";
export type { DialectDefinition, FieldTable, NormalizedTags, TagMap, TagValues } from "./types.ts";
