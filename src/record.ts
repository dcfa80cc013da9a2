import { extname } from "node:path";
import type { NormalizedFields, NormalizedRecord, TagFormat } from "./types.ts";

export interface RecordParts {
  container: string;
  tagFormat: TagFormat;
  fields: NormalizedFields;
  durationSeconds?: number;
  chapters?: number;
  hasCoverArt?: boolean;
}

/** Lowercase extension without the dot: "/music/a.MP3" => "mp3" */
export function containerFromPath(filePath: string): string {
  return extname(filePath).slice(1).toLowerCase();
}

export function durationToMs(seconds: number | undefined): number | undefined {
  if (seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) return undefined;
  return Math.floor(seconds * 1000);
}

/**
 * Assembles a frozen record. Optional attributes are only set when
 * determined: no zero chapters, no zero duration, no undefined cover flag.
 */
export function buildRecord(parts: RecordParts): NormalizedRecord {
  const durationMs = durationToMs(parts.durationSeconds);
  const chapters = parts.chapters !== undefined && parts.chapters > 0 ? parts.chapters : undefined;

  return Object.freeze({
    container: parts.container,
    tagFormat: parts.tagFormat,
    fields: Object.freeze({ ...parts.fields }),
    ...(durationMs !== undefined ? { durationMs } : {}),
    ...(chapters !== undefined ? { chapters } : {}),
    ...(parts.hasCoverArt !== undefined ? { hasCoverArt: parts.hasCoverArt } : {}),
  });
}

/** A record counts as data when any field or optional attribute is populated */
export function hasData(record: NormalizedRecord): boolean {
  return (
    Object.keys(record.fields).length > 0 ||
    record.durationMs !== undefined ||
    record.chapters !== undefined ||
    record.hasCoverArt !== undefined
  );
}
