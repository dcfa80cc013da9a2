import type { DialectDefinition, FieldTable, TagMap } from "./types.ts";
import { valueToText } from "./common.ts";

/** General-track attributes of a video container, lowercased */
export const GENERAL_FIELDS: FieldTable = {
  title: "title",
  album: "album",
  performer: "artist",
  album_performer: "album_artist",
  genre: "genre",
  recorded_date: "date",
  released_date: "date",
  composer: "composer",
  comment: "comment",
  encoded_application: "encoder",
  track_position: "track",
  track_position_total: "track_total",
  part_position: "disc",
  part_position_total: "disc_total",
};

// Menu entries are keyed by their start time: _00_04_10_500
const MENU_ENTRY = /^_\d{2}_\d{2}_\d{2}_\d{3}$/;

export function countMenuChapters(menu: TagMap): number {
  return Object.keys(menu).filter((key) => MENU_ENTRY.test(key)).length;
}

export const generalDialect: DialectDefinition = {
  fields: GENERAL_FIELDS,
  hasCoverArt: (tags) => {
    const cover = valueToText(tags.cover?.[0]);
    return cover === undefined ? undefined : cover.toLowerCase() === "yes";
  },
};
