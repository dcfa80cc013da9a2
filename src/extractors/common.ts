import { DecodeError, ExtractionError, ToolUnavailableError, logHandlerError } from "../utils/errors.ts";

export function claims(extensions: ReadonlySet<string>, extension: string): boolean {
  return extensions.has(extension.replace(/^\./, "").toLowerCase());
}

/**
 * Runs a decode call for one file. A rejection is logged and turned into
 * null, so `extract` never rejects.
 */
export async function guardDecode<A>(
  tag: string,
  filePath: string,
  capability: string,
  decode: () => Promise<A | null>,
): Promise<A | null> {
  try {
    return await decode();
  } catch (error) {
    const known = error instanceof ExtractionError || error instanceof ToolUnavailableError;
    logHandlerError(tag, filePath, known ? error : new DecodeError(filePath, capability, error));
    return null;
  }
}
