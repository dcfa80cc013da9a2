import type { DialectDefinition, FieldTable } from "./types.ts";
import { countValues, keysWithPrefix } from "./common.ts";

/** ID3v2.3/2.4 frames first, then their ID3v2.2 three-character forms */
export const ID3_FIELDS: FieldTable = {
  TIT2: "title",
  TPE1: "artist",
  TALB: "album",
  TPE2: "album_artist",
  TCON: "genre",
  TDRC: "date", // Recording date
  TYER: "date",
  TORY: "date", // Original release year
  TDOR: "date",
  TLAN: "language",
  TPUB: "publisher",
  TCOM: "composer",
  TSSE: "encoder",
  COMM: "comment",
  USLT: "lyrics",
  TRCK: "track",
  TPOS: "disc",

  TT2: "title",
  TP1: "artist",
  TAL: "album",
  TP2: "album_artist",
  TCO: "genre",
  TYE: "date",
  TOR: "date",
  TLA: "language",
  TPB: "publisher",
  TCM: "composer",
  TSS: "encoder",
  COM: "comment",
  ULT: "lyrics",
  TRK: "track",
  TPA: "disc",
};

const PICTURE_PREFIXES = ["APIC", "PIC"];
const CHAPTER_PREFIXES = ["CHAP"];

export const id3Dialect: DialectDefinition = {
  fields: ID3_FIELDS,
  // A missing picture frame leaves cover art undetermined
  hasCoverArt: (tags) => (keysWithPrefix(tags, PICTURE_PREFIXES).length > 0 ? true : undefined),
  countChapters: (tags) => countValues(tags, keysWithPrefix(tags, CHAPTER_PREFIXES)),
};
