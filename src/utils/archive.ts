import { open } from "node:fs/promises";
import { spawnWithTimeout } from "./process.ts";

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

export async function isZipArchive(filePath: string): Promise<boolean> {
  // Missing or unreadable files are simply not archives
  const handle = await open(filePath, "r").catch(() => null);
  if (!handle) return false;

  try {
    const header = new Uint8Array(ZIP_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    return bytesRead === ZIP_MAGIC.length && ZIP_MAGIC.every((byte, i) => header[i] === byte);
  } finally {
    await handle.close();
  }
}

export async function readEntry(filePath: string, entryPath: string, timeout?: number): Promise<Buffer | null> {
  const result = await spawnWithTimeout({ command: ["unzip", "-p", filePath, entryPath], timeout });
  if (result.timedOut || result.exitCode !== 0 || result.stdout.byteLength === 0) return null;
  return result.stdout;
}

export async function readEntryText(filePath: string, entryPath: string, timeout?: number): Promise<string | null> {
  const buffer = await readEntry(filePath, entryPath, timeout);
  return buffer ? buffer.toString("utf-8") : null;
}
