import type { DialectDefinition, FieldTable } from "./types.ts";

/** RIFF INFO chunk ids */
export const RIFF_FIELDS: FieldTable = {
  INAM: "title",
  IART: "artist",
  IPRD: "album",
  IGNR: "genre",
  ICRD: "date",
  ICMT: "comment",
  ILNG: "language",
  ISFT: "encoder",
  ITRK: "track",
};

export const riffDialect: DialectDefinition = {
  fields: RIFF_FIELDS,
};
