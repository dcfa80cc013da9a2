import { describe, test, expect, vi } from "vitest";
import { Effect } from "effect";
import { ExtractorRegistry, buildDefaultRegistry, createRegistry } from "../../src/registry.ts";
import { buildRecord } from "../../src/record.ts";
import type { Extractor } from "../../src/extractors/types.ts";
import type { NormalizedRecord } from "../../src/types.ts";
import { createRecordingLogger } from "../helpers/logger.ts";

interface FakeOptions {
  supports?: boolean;
  result?: NormalizedRecord | null;
}

function fakeExtractor(name: string, options: FakeOptions = {}) {
  const { supports = true, result = null } = options;
  return {
    name,
    available: true,
    supports: vi.fn((_filePath: string, _extension: string, _mime?: string) => supports),
    extract: vi.fn(async (_filePath: string) => result),
  } satisfies Extractor;
}

const titled = (title: string) => buildRecord({ container: "mp3", tagFormat: "id3", fields: { title } });

describe("ExtractorRegistry", () => {
  test("returns the first non-empty result and stops there", async () => {
    const { layer } = createRecordingLogger();
    const first = fakeExtractor("first", { result: titled("A") });
    const second = fakeExtractor("second", { result: titled("B") });
    const registry = new ExtractorRegistry([first, second]);

    const record = await Effect.runPromise(registry.extractEffect("/a.mp3", "mp3").pipe(Effect.provide(layer)));

    expect(record?.fields.title).toBe("A");
    expect(second.supports).not.toHaveBeenCalled();
    expect(second.extract).not.toHaveBeenCalled();
  });

  test("skips extractors that do not support the file", async () => {
    const { layer } = createRecordingLogger();
    const first = fakeExtractor("first", { supports: false, result: titled("A") });
    const second = fakeExtractor("second", { result: titled("B") });
    const registry = new ExtractorRegistry([first, second]);

    const record = await Effect.runPromise(registry.extractEffect("/a.mp3", "mp3").pipe(Effect.provide(layer)));

    expect(record?.fields.title).toBe("B");
    expect(first.extract).not.toHaveBeenCalled();
  });

  test("passes path, extension and mime to supports", async () => {
    const { layer } = createRecordingLogger();
    const only = fakeExtractor("only");
    const registry = new ExtractorRegistry([only]);

    await Effect.runPromise(registry.extractEffect("/a.flac", "flac", "audio/flac").pipe(Effect.provide(layer)));

    expect(only.supports).toHaveBeenCalledWith("/a.flac", "flac", "audio/flac");
  });

  test("moves past empty and null results", async () => {
    const { layer } = createRecordingLogger();
    const empty = fakeExtractor("empty", { result: buildRecord({ container: "mp3", tagFormat: "unknown", fields: {} }) });
    const none = fakeExtractor("none");
    const last = fakeExtractor("last", { result: titled("C") });
    const registry = new ExtractorRegistry([empty, none, last]);

    const record = await Effect.runPromise(registry.extractEffect("/a.mp3", "mp3").pipe(Effect.provide(layer)));

    expect(record?.fields.title).toBe("C");
  });

  test("isolates an extractor that rejects", async () => {
    const { calls, layer } = createRecordingLogger();
    const broken = fakeExtractor("broken");
    broken.extract.mockRejectedValue(new Error("decoder crashed"));
    const next = fakeExtractor("next", { result: titled("D") });
    const registry = new ExtractorRegistry([broken, next]);

    const record = await Effect.runPromise(registry.extractEffect("/a.mp3", "mp3").pipe(Effect.provide(layer)));

    expect(record?.fields.title).toBe("D");
    const errors = calls.filter((call) => call.level === "error");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.msg).toBe("Extractor broken failed");
    expect(errors[0]?.ctx).toEqual({ file: "/a.mp3", extractor: "broken" });
  });

  test("isolates a supports check that throws", async () => {
    const { layer } = createRecordingLogger();
    const broken = fakeExtractor("broken");
    broken.supports.mockImplementation(() => {
      throw new Error("bad check");
    });
    const next = fakeExtractor("next", { result: titled("E") });
    const registry = new ExtractorRegistry([broken, next]);

    const record = await Effect.runPromise(registry.extractEffect("/a.mp3", "mp3").pipe(Effect.provide(layer)));

    expect(record?.fields.title).toBe("E");
    expect(broken.extract).not.toHaveBeenCalled();
  });

  test("returns null when nothing produces data", async () => {
    const { calls, layer } = createRecordingLogger();
    const registry = new ExtractorRegistry([fakeExtractor("a", { supports: false }), fakeExtractor("b")]);

    const record = await Effect.runPromise(registry.extractEffect("/a.txt", "txt").pipe(Effect.provide(layer)));

    expect(record).toBeNull();
    expect(calls.at(-1)).toEqual({
      level: "debug",
      tag: "Registry",
      msg: "No metadata",
      ctx: { file: "/a.txt", extension: "txt" },
    });
  });

  test("returns null with no extractors", async () => {
    const registry = new ExtractorRegistry([]);
    await expect(registry.extract("/a.mp3", "mp3")).resolves.toBeNull();
  });

  test("extract runs with the live logger", async () => {
    const registry = new ExtractorRegistry([fakeExtractor("only", { result: titled("F") })]);
    const record = await registry.extract("/a.mp3", "mp3");
    expect(record?.fields.title).toBe("F");
  });
});

describe("createRegistry", () => {
  test("builds audio, video and ebook extractors in order", () => {
    expect(createRegistry({}).names).toEqual(["audio", "video", "ebook"]);
  });

  test("follows a custom order", () => {
    expect(createRegistry({}, ["ebook", "audio"]).names).toEqual(["ebook", "audio"]);
  });

  test("treats missing decoders as unavailable capabilities", async () => {
    const registry = createRegistry({});
    await expect(registry.extract("/a.mp3", "mp3")).resolves.toBeNull();
  });

  test("dispatches to the first extractor with data", async () => {
    const registry = createRegistry({
      audio: {
        decode: async () => ({ dialect: "mp4", tags: { "©nam": ["Clip"] }, durationSeconds: 3 }),
      },
      video: {
        decode: async () => [{ type: "General", attributes: { title: "Video title" } }],
      },
    });

    const record = await registry.extract("/clips/a.mp4", "mp4");

    expect(record).toStrictEqual({
      container: "mp4",
      tagFormat: "mp4",
      fields: { title: "Clip" },
      durationMs: 3000,
      hasCoverArt: false,
    });
  });

  test("falls back to the video extractor when audio finds nothing", async () => {
    const registry = createRegistry({
      audio: { decode: async () => ({ dialect: "unknown", tags: {} }) },
      video: { decode: async () => [{ type: "General", attributes: { title: "Video title" } }] },
    });

    const record = await registry.extract("/clips/a.mov", "mov");

    expect(record).toStrictEqual({ container: "mov", tagFormat: "mp4", fields: { title: "Video title" } });
  });
});

describe("buildDefaultRegistry", () => {
  test("loads the configured extractors in order", async () => {
    const registry = await buildDefaultRegistry({ extractors: ["video", "audio"] });
    expect(registry.names).toEqual(["video", "audio"]);
  }, 30000);

  test("defaults to audio, video, ebook", async () => {
    const registry = await buildDefaultRegistry();
    expect(registry.names).toEqual(["audio", "video", "ebook"]);
  }, 30000);
});
