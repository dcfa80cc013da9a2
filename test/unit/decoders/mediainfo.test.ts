import { describe, test, expect } from "vitest";
import { toMediaTracks } from "../../../src/decoders/mediainfo.ts";

describe("toMediaTracks", () => {
  test("lowercases attributes and flattens extra", () => {
    const tracks = toMediaTracks({
      media: {
        track: [
          { "@type": "General", Title: "Film", Duration: "12.5", extra: { Cover: "Yes" } },
          { "@type": "Menu", extra: { _00_00_00_000: "Intro" } },
        ],
      },
    });

    expect(tracks).toEqual([
      { type: "General", attributes: { title: "Film", duration: "12.5", cover: "Yes" } },
      { type: "Menu", attributes: { _00_00_00_000: "Intro" } },
    ]);
  });

  test("returns no tracks for an empty result", () => {
    expect(toMediaTracks({ media: null })).toEqual([]);
    expect(toMediaTracks({})).toEqual([]);
  });

  test("rejects malformed results", () => {
    expect(toMediaTracks("garbage")).toBeNull();
    expect(toMediaTracks({ media: { track: "x" } })).toBeNull();
  });
});
