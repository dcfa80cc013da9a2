import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isZipArchive } from "../../../src/utils/archive.ts";

describe("isZipArchive", () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await mkdtemp(join(tmpdir(), "archive-test-"));
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  test("recognizes the local file header signature", async () => {
    const path = join(testDir, "book.epub");
    await writeFile(path, Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]));
    expect(await isZipArchive(path)).toBe(true);
  });

  test("rejects other content", async () => {
    const path = join(testDir, "fake.epub");
    await writeFile(path, "hello world");
    expect(await isZipArchive(path)).toBe(false);
  });

  test("rejects a file shorter than the signature", async () => {
    const path = join(testDir, "short.epub");
    await writeFile(path, "PK");
    expect(await isZipArchive(path)).toBe(false);
  });

  test("rejects a missing file", async () => {
    expect(await isZipArchive(join(testDir, "missing.epub"))).toBe(false);
  });
});
