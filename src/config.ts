import type { LogLevel } from "./logging/types.ts";
import { isLogLevel } from "./logging/types.ts";

export const EXTRACTOR_NAMES = ["audio", "video", "ebook"] as const;
export type ExtractorName = (typeof EXTRACTOR_NAMES)[number];

export interface Config {
  logLevel: LogLevel;
  /** Extractors to build, in priority order */
  extractors: ExtractorName[];
  toolTimeoutMs: number;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 15000;

export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

function isExtractorName(value: string): value is ExtractorName {
  return EXTRACTOR_NAMES.some((name) => name === value);
}

function parseLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError("LOG_LEVEL", `${value} (must be debug, info, warn or error)`);
  }
  return level;
}

function parseExtractors(value: string): ExtractorName[] {
  const names = value
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);

  if (names.length === 0) {
    throw new ConfigError("TAGNORM_EXTRACTORS", "empty list");
  }

  const result: ExtractorName[] = [];
  for (const name of names) {
    if (!isExtractorName(name)) {
      throw new ConfigError("TAGNORM_EXTRACTORS", `unknown extractor ${name}`);
    }
    if (!result.includes(name)) result.push(name);
  }
  return result;
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 1) {
    throw new ConfigError("TAGNORM_TOOL_TIMEOUT_MS", `${value} (must be a positive integer)`);
  }
  return timeout;
}

/** Strict: throws ConfigError on the first invalid variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL || "info"),
    extractors: parseExtractors(env.TAGNORM_EXTRACTORS || EXTRACTOR_NAMES.join(",")),
    toolTimeoutMs: parseTimeout(env.TAGNORM_TOOL_TIMEOUT_MS || String(DEFAULT_TOOL_TIMEOUT_MS)),
  };
}

export interface LoadedConfig {
  config: Config;
  /** One per variable that fell back to its default */
  warnings: ConfigError[];
}

/** Like loadConfig, but an invalid variable takes its default instead of throwing */
export function loadConfigWithDefaults(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const warnings: ConfigError[] = [];

  const read = <T>(parse: () => T, fallback: T): T => {
    try {
      return parse();
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      warnings.push(error);
      return fallback;
    }
  };

  const config: Config = {
    logLevel: read(() => parseLogLevel(env.LOG_LEVEL || "info"), "info"),
    extractors: read(() => parseExtractors(env.TAGNORM_EXTRACTORS || EXTRACTOR_NAMES.join(",")), [...EXTRACTOR_NAMES]),
    toolTimeoutMs: read(
      () => parseTimeout(env.TAGNORM_TOOL_TIMEOUT_MS || String(DEFAULT_TOOL_TIMEOUT_MS)),
      DEFAULT_TOOL_TIMEOUT_MS,
    ),
  };
  return { config, warnings };
}

const loaded = loadConfigWithDefaults();

export const config = loaded.config;
export const configWarnings: readonly ConfigError[] = loaded.warnings;
