import { XMLParser } from "fast-xml-parser";
import { Schema } from "@effect/schema";
import { Either } from "effect";
import type { EbookMetadata, EbookMetadataDecoder, MetadataItem } from "../extractors/types.ts";
import { OPF_ITEM_KEY, OPF_META_KEY } from "../dialects/opf.ts";
import { isZipArchive, readEntryText } from "../utils/archive.ts";
import { isToolAvailable } from "../utils/process.ts";
import { config } from "../config.ts";
import { log, errorContext } from "../logging/logger.ts";

const OPF_MEDIA_TYPE = "application/oebps-package+xml";
const CONTAINER_PATH = "META-INF/container.xml";

/** The fifteen Dublin Core elements */
export const DC_TERMS = [
  "title",
  "creator",
  "subject",
  "description",
  "publisher",
  "contributor",
  "date",
  "type",
  "format",
  "identifier",
  "source",
  "language",
  "relation",
  "coverage",
  "rights",
];

const ARRAY_ELEMENTS = new Set([...DC_TERMS, "meta", "item", "rootfile"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  htmlEntities: true,
  isArray: (name) => ARRAY_ELEMENTS.has(name),
});

const XmlNode = Schema.Record({ key: Schema.String, value: Schema.Unknown });

const ContainerDocument = Schema.Struct({
  container: Schema.Struct({
    rootfiles: Schema.Struct({
      rootfile: Schema.Array(XmlNode),
    }),
  }),
});

const OpfDocument = Schema.Struct({
  package: Schema.Struct({
    metadata: Schema.optional(Schema.Unknown),
    manifest: Schema.optional(Schema.Unknown),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attributeString(node: Readonly<Record<string, unknown>>, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

export function findOpfPath(containerXml: string): string | undefined {
  const decoded = Schema.decodeUnknownEither(ContainerDocument)(xmlParser.parse(containerXml));
  if (Either.isLeft(decoded)) return undefined;

  const files = decoded.right.container.rootfiles.rootfile;

  // Prefer OPF by media-type
  const opf = files.find((f) => attributeString(f, "media-type") === OPF_MEDIA_TYPE);
  const opfPath = opf ? attributeString(opf, "full-path") : undefined;
  if (opfPath) return opfPath;

  // Fallback to first with full-path
  return files.map((f) => attributeString(f, "full-path")).find(Boolean);
}

function toMetadataItem(node: unknown): MetadataItem | null {
  if (typeof node === "string" || typeof node === "number") {
    return { value: String(node).trim(), attributes: {} };
  }
  if (!isPlainObject(node)) return null;

  const attributes: Record<string, string> = {};
  let value = "";
  for (const [key, raw] of Object.entries(node)) {
    if (key === "#text" && (typeof raw === "string" || typeof raw === "number")) {
      value = String(raw).trim();
    } else if (key.startsWith("@_") && typeof raw === "string") {
      attributes[key.slice(2)] = raw;
    }
  }
  return { value, attributes };
}

export function cleanDescription(desc: string): string {
  return desc
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

function toItems(node: unknown): MetadataItem[] {
  const nodes: unknown[] = Array.isArray(node) ? node : node === undefined ? [] : [node];
  return nodes.map(toMetadataItem).filter((item): item is MetadataItem => item !== null);
}

/**
 * Groups an OPF package document as `DC:<term>` lists plus `OPF:meta` and
 * `OPF:item` (manifest) lists. Dublin Core entries without text are dropped.
 */
export function parseOpfPackage(opfXml: string): EbookMetadata | null {
  const decoded = Schema.decodeUnknownEither(OpfDocument)(xmlParser.parse(opfXml));
  if (Either.isLeft(decoded)) return null;

  const { metadata, manifest } = decoded.right.package;
  const groups: Record<string, MetadataItem[]> = {};

  if (isPlainObject(metadata)) {
    for (const term of DC_TERMS) {
      const items = toItems(metadata[term])
        .map((item) => (term === "description" ? { ...item, value: cleanDescription(item.value) } : item))
        .filter((item) => item.value !== "");
      if (items.length > 0) groups[`DC:${term}`] = items;
    }

    const metas = toItems(metadata.meta);
    if (metas.length > 0) groups[OPF_META_KEY] = metas;
  }

  if (isPlainObject(manifest)) {
    const items = toItems(manifest.item);
    if (items.length > 0) groups[OPF_ITEM_KEY] = items;
  }

  return groups;
}

export function createEbookMetadataDecoder(timeoutMs: number): EbookMetadataDecoder {
  return {
    async decode(filePath) {
      if (!(await isZipArchive(filePath))) return null;

      const container = await readEntryText(filePath, CONTAINER_PATH, timeoutMs);
      if (!container) return null;

      const opfPath = findOpfPath(container);
      if (!opfPath) return null;

      const opf = await readEntryText(filePath, opfPath, timeoutMs);
      if (!opf) return null;

      return parseOpfPackage(opf);
    },
  };
}

export async function loadEbookMetadataDecoder(
  timeoutMs: number = config.toolTimeoutMs,
): Promise<EbookMetadataDecoder | null> {
  const available = await isToolAvailable(["unzip", "-v"], timeoutMs).catch((error: unknown) => {
    log.warn("EbookDecoder", "unzip probe failed", errorContext(error, { capability: "unzip", tool: "unzip" }));
    return false;
  });
  if (!available) {
    log.debug("EbookDecoder", "unzip not available", { capability: "unzip", tool: "unzip" });
    return null;
  }
  return createEbookMetadataDecoder(timeoutMs);
}
