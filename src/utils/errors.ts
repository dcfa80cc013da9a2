import { log } from "../logging/logger.ts";

export class ExtractionError extends Error {
  public readonly filePath: string;
  public readonly originalError?: unknown;

  constructor(message: string, filePath: string, originalError?: unknown) {
    super(message);
    this.name = "ExtractionError";
    this.filePath = filePath;
    this.originalError = originalError;
  }
}

export class DecodeError extends ExtractionError {
  constructor(filePath: string, capability: string, cause?: unknown) {
    super(`Failed to decode ${capability} metadata`, filePath, cause);
    this.name = "DecodeError";
  }
}

/** Thrown out of an extractor that broke its own no-throw contract */
export class ExtractorFaultError extends ExtractionError {
  public readonly extractor: string;

  constructor(extractor: string, filePath: string, cause?: unknown) {
    super(`Extractor ${extractor} failed`, filePath, cause);
    this.name = "ExtractorFaultError";
    this.extractor = extractor;
  }
}

export class ToolUnavailableError extends Error {
  public readonly tool: string;

  constructor(tool: string, cause?: unknown) {
    super(`Executable not found: ${tool}`, { cause });
    this.name = "ToolUnavailableError";
    this.tool = tool;
  }
}

export function logHandlerError(tag: string, filePath: string, error: unknown): void {
  if (error instanceof ToolUnavailableError) {
    log.debug(tag, "External tool not available", { file: filePath, tool: error.tool });
    return;
  }

  if (error instanceof ExtractionError) {
    log.error(tag, error.message, error.originalError, { file: filePath });
  } else if (error instanceof Error) {
    log.error(tag, "Unexpected error", error, { file: filePath });
  } else {
    log.error(tag, "Unknown error", error, { file: filePath });
  }
}
