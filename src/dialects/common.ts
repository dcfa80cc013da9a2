import { normalizeTrackDisc } from "../notation.ts";
import { isNumberField } from "../types.ts";
import type { NormalizedFields, NumberField, TextField } from "../types.ts";
import type { DialectDefinition, NormalizedTags, TagMap, TagValues } from "./types.ts";

const TOTAL_FIELD: Partial<Record<NumberField, NumberField>> = {
  track: "track_total",
  disc: "disc_total",
};

/** Unwraps decoder value shapes: plain scalars, `{ text }` frames, `{ value }` items */
export function unwrapValue(value: unknown): unknown {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    if ("text" in value) return unwrapValue(value.text);
    if ("value" in value) return unwrapValue(value.value);
  }
  return value;
}

export function valueToText(value: unknown): string | undefined {
  const raw = unwrapValue(value);
  if (typeof raw === "string") return raw.trim() || undefined;
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  return undefined;
}

function joinText(values: TagValues): string | undefined {
  const parts = values.map(valueToText).filter((s): s is string => !!s);
  return parts.length > 0 ? parts.join(", ") : undefined;
}

function upperCaseKeys(tags: TagMap): TagMap {
  const index: Record<string, unknown[]> = {};
  for (const [key, values] of Object.entries(tags)) {
    (index[key.toUpperCase()] ??= []).push(...values);
  }
  return index;
}

function applyText(fields: NormalizedFields, field: TextField, values: TagValues, joined: boolean): void {
  if (fields[field] !== undefined) return;
  const text = joined ? joinText(values) : valueToText(values[0]);
  if (text) fields[field] = text;
}

function applyNumber(fields: NormalizedFields, field: NumberField, raw: unknown): void {
  const { number, total } = normalizeTrackDisc(unwrapValue(raw));
  const totalField = TOTAL_FIELD[field];

  if (!totalField) {
    // A *_total key on its own; zero means unknown
    if (fields[field] === undefined && number !== null && number > 0) fields[field] = number;
    return;
  }

  if (fields[field] === undefined && number !== null) fields[field] = number;
  if (fields[totalField] === undefined && total !== null && total > 0) fields[totalField] = total;
}

export function mapFields(tags: TagMap, dialect: DialectDefinition): NormalizedFields {
  const insensitive = dialect.caseInsensitiveKeys === true;
  const lookup = insensitive ? upperCaseKeys(tags) : tags;
  const fields: NormalizedFields = {};

  for (const [key, field] of Object.entries(dialect.fields)) {
    const values = lookup[insensitive ? key.toUpperCase() : key];
    if (!values || values.length === 0) continue;

    if (isNumberField(field)) {
      applyNumber(fields, field, values[0]);
    } else {
      applyText(fields, field, values, dialect.joinedFields?.includes(field) ?? false);
    }
  }

  return fields;
}

export function keysWithPrefix(tags: TagMap, prefixes: readonly string[]): string[] {
  return Object.keys(tags).filter((key) => prefixes.some((prefix) => key.startsWith(prefix)));
}

export function countValues(tags: TagMap, keys: readonly string[]): number {
  return keys.reduce((sum, key) => sum + (tags[key]?.length ?? 0), 0);
}

export function hasValues(tags: TagMap, key: string): boolean {
  return (tags[key]?.length ?? 0) > 0;
}

/**
 * Maps a decoded tag container through one dialect. Cover art and chapters
 * stay undetermined for an empty container.
 */
export function normalizeTags(tags: TagMap, dialect: DialectDefinition): NormalizedTags {
  const fields = mapFields(tags, dialect);
  if (Object.keys(tags).length === 0) return { fields };

  return {
    fields,
    hasCoverArt: dialect.hasCoverArt?.(tags),
    chapters: dialect.countChapters?.(tags),
  };
}
