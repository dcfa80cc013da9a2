import type { DialectDefinition, FieldTable } from "./types.ts";
import { hasValues } from "./common.ts";

export const MP4_FIELDS: FieldTable = {
  "©nam": "title",
  "©ART": "artist",
  "©alb": "album",
  aART: "album_artist",
  "©gen": "genre",
  "©day": "date",
  "©lyr": "lyrics",
  "©too": "encoder",
  "©wrt": "composer",
  "©cmt": "comment",
  trkn: "track",
  disk: "disc",
};

export const mp4Dialect: DialectDefinition = {
  fields: MP4_FIELDS,
  hasCoverArt: (tags) => hasValues(tags, "covr"),
};
