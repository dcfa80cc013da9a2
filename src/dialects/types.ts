import type { CanonicalField, NormalizedFields, TextField } from "../types.ts";

/** Values stored under one dialect key, in file order */
export type TagValues = readonly unknown[];

/** Opaque key -> values container handed over by a decoder */
export type TagMap = Readonly<Record<string, TagValues>>;

/** Dialect key -> canonical field. Earlier keys win when several map to one field */
export type FieldTable = Readonly<Record<string, CanonicalField>>;

export interface DialectDefinition {
  readonly fields: FieldTable;
  /** Match keys regardless of case (Vorbis comments, APE) */
  readonly caseInsensitiveKeys?: boolean;
  /** Fields built from every value joined with ", " instead of the first one */
  readonly joinedFields?: readonly TextField[];
  readonly hasCoverArt?: (tags: TagMap) => boolean | undefined;
  readonly countChapters?: (tags: TagMap) => number | undefined;
}

export interface NormalizedTags {
  fields: NormalizedFields;
  hasCoverArt?: boolean;
  chapters?: number;
}
