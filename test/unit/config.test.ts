import { describe, test, expect, vi, afterEach } from "vitest";
import { ConfigError, DEFAULT_TOOL_TIMEOUT_MS, loadConfig, loadConfigWithDefaults } from "../../src/config.ts";

describe("loadConfig", () => {
  test("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      extractors: ["audio", "video", "ebook"],
      toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
    });
  });

  test("reads the log level", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" }).logLevel).toBe("debug");
  });

  test("matches the log level regardless of case", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG" }).logLevel).toBe("debug");
    expect(loadConfig({ LOG_LEVEL: " Warn " }).logLevel).toBe("warn");
  });

  test("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  test("normalizes and dedupes the extractor list", () => {
    expect(loadConfig({ TAGNORM_EXTRACTORS: " Ebook, audio ,ebook" }).extractors).toEqual(["ebook", "audio"]);
  });

  test("rejects unknown extractors", () => {
    expect(() => loadConfig({ TAGNORM_EXTRACTORS: "audio,tape" })).toThrow(
      "Invalid TAGNORM_EXTRACTORS: unknown extractor tape",
    );
  });

  test("rejects an empty extractor list", () => {
    expect(() => loadConfig({ TAGNORM_EXTRACTORS: " , " })).toThrow("Invalid TAGNORM_EXTRACTORS: empty list");
  });

  test("reads the tool timeout", () => {
    expect(loadConfig({ TAGNORM_TOOL_TIMEOUT_MS: "2500" }).toolTimeoutMs).toBe(2500);
  });

  test("rejects a timeout that is not a positive integer", () => {
    for (const value of ["0", "-5", "1.5", "abc"]) {
      expect(() => loadConfig({ TAGNORM_TOOL_TIMEOUT_MS: value })).toThrow(ConfigError);
    }
  });

  test("names the offending variable", () => {
    try {
      loadConfig({ LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.variable : undefined).toBe("LOG_LEVEL");
    }
  });
});

describe("loadConfigWithDefaults", () => {
  test("reports no warnings for a valid environment", () => {
    expect(loadConfigWithDefaults({ LOG_LEVEL: "warn" })).toEqual({
      config: { logLevel: "warn", extractors: ["audio", "video", "ebook"], toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS },
      warnings: [],
    });
  });

  test("falls back to defaults for invalid variables", () => {
    const { config, warnings } = loadConfigWithDefaults({
      LOG_LEVEL: "trace",
      TAGNORM_EXTRACTORS: "video",
      TAGNORM_TOOL_TIMEOUT_MS: "soon",
    });

    expect(config).toEqual({ logLevel: "info", extractors: ["video"], toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS });
    expect(warnings.map((warning) => warning.variable)).toEqual(["LOG_LEVEL", "TAGNORM_TOOL_TIMEOUT_MS"]);
  });
});

describe("import-time configuration", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  test("loads the library with an unsupported LOG_LEVEL", async () => {
    vi.stubEnv("LOG_LEVEL", "trace");
    vi.resetModules();
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    const library = await import("../../src/index.ts");
    const { config } = await import("../../src/config.ts");

    expect(library.createRegistry({}).names).toEqual(["audio", "video", "ebook"]);
    expect(config.logLevel).toBe("info");
    expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({
      level: "warn",
      tag: "Config",
      msg: "Invalid setting, using default",
      error: "Invalid LOG_LEVEL: trace (must be debug, info, warn or error)",
    });
  });
});
