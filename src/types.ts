/** Tag dialect a record was normalized from */
export type TagFormat = "id3" | "mp4" | "vorbis" | "ape" | "riff" | "matroska" | "opf" | "unknown";

export const TEXT_FIELDS = [
  "title",
  "artist",
  "album",
  "album_artist",
  "genre",
  "date",
  "language",
  "publisher",
  "author",
  "identifier",
  "lyrics",
  "encoder",
  "composer",
  "comment",
] as const;

export const NUMBER_FIELDS = ["track", "track_total", "disc", "disc_total"] as const;

export type TextField = (typeof TEXT_FIELDS)[number];
export type NumberField = (typeof NUMBER_FIELDS)[number];

/** Field name shared by every dialect */
export type CanonicalField = TextField | NumberField;

export type NormalizedFields = {
  [K in TextField]?: string;
} & {
  [K in NumberField]?: number;
};

export interface NormalizedRecord {
  /** Lowercase file type from the extension (mp3, mkv, epub) */
  readonly container: string;
  readonly tagFormat: TagFormat;
  readonly fields: Readonly<NormalizedFields>;
  /** Only present when the source exposes a positive duration */
  readonly durationMs?: number;
  /** Only present when greater than zero */
  readonly chapters?: number;
  /** Only present when the dialect can tell */
  readonly hasCoverArt?: boolean;
}

export interface TrackDiscPair {
  number: number | null;
  total: number | null;
}

export function isNumberField(field: CanonicalField): field is NumberField {
  return NUMBER_FIELDS.some((numberField) => numberField === field);
}

/** Dialects a tagged-audio decoder can report */
export type AudioDialect = Extract<TagFormat, "id3" | "mp4" | "vorbis" | "ape" | "riff" | "unknown">;
