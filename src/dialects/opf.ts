import type { DialectDefinition, FieldTable, TagValues } from "./types.ts";

/** Dublin Core groups keyed as `<namespace>:<term>` */
export const OPF_FIELDS: FieldTable = {
  "DC:title": "title",
  "DC:creator": "author",
  "DC:language": "language",
  "DC:publisher": "publisher",
  "DC:date": "date",
  "DC:identifier": "identifier",
  "DC:subject": "genre",
  "DC:description": "comment",
};

export const OPF_META_KEY = "OPF:meta";
export const OPF_ITEM_KEY = "OPF:item";

function attributeOf(item: unknown, name: string): string | undefined {
  if (typeof item !== "object" || item === null || !("attributes" in item)) return undefined;
  const { attributes } = item;
  if (typeof attributes !== "object" || attributes === null) return undefined;

  const value: unknown = Object.entries(attributes).find(([key]) => key === name)?.[1];
  return typeof value === "string" ? value : undefined;
}

function hasEpub2Cover(metas: TagValues, items: TagValues): boolean {
  const coverId = metas.map((m) => (attributeOf(m, "name") === "cover" ? attributeOf(m, "content") : undefined)).find(Boolean);
  if (!coverId) return false;
  return items.some((i) => attributeOf(i, "id") === coverId);
}

function hasEpub3Cover(items: TagValues): boolean {
  return items.some((i) => (attributeOf(i, "properties") ?? "").split(/\s+/).includes("cover-image"));
}

export const opfDialect: DialectDefinition = {
  fields: OPF_FIELDS,
  joinedFields: ["author", "genre"],
  hasCoverArt: (tags) => {
    const metas = tags[OPF_META_KEY];
    const items = tags[OPF_ITEM_KEY];
    if (!metas && !items) return undefined;
    return hasEpub2Cover(metas ?? [], items ?? []) || hasEpub3Cover(items ?? []);
  },
};
