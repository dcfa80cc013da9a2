import type { DialectDefinition, FieldTable } from "./types.ts";
import { hasValues } from "./common.ts";

/**
 * Vorbis comment names. APE items share the layout, so the APE spellings
 * (`Album Artist`, `Year`, `Track`, `Disc`) sit in the same table.
 */
export const VORBIS_FIELDS: FieldTable = {
  TITLE: "title",
  ARTIST: "artist",
  ALBUM: "album",
  ALBUMARTIST: "album_artist",
  "ALBUM ARTIST": "album_artist",
  GENRE: "genre",
  DATE: "date",
  YEAR: "date",
  TRACKNUMBER: "track",
  TRACK: "track",
  TRACKTOTAL: "track_total",
  TOTALTRACKS: "track_total",
  DISCNUMBER: "disc",
  DISC: "disc",
  DISCTOTAL: "disc_total",
  TOTALDISCS: "disc_total",
  LANGUAGE: "language",
  PUBLISHER: "publisher",
  LABEL: "publisher",
  COMPOSER: "composer",
  COMMENT: "comment",
  DESCRIPTION: "comment",
  LYRICS: "lyrics",
  ENCODER: "encoder",
};

export const vorbisDialect: DialectDefinition = {
  fields: VORBIS_FIELDS,
  caseInsensitiveKeys: true,
  hasCoverArt: (tags) =>
    Object.keys(tags).some((key) => {
      const upper = key.toUpperCase();
      return (upper === "METADATA_BLOCK_PICTURE" || upper === "COVERART") && hasValues(tags, key);
    }),
};

export const apeDialect: DialectDefinition = {
  fields: VORBIS_FIELDS,
  caseInsensitiveKeys: true,
};
