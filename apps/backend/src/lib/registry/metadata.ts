import type { JsonValue } from "@repo/zod-types";

/**
 * Custom metadata is stored as a tagged value tree rather than raw JSON so
 * that flattening it into indexable text is a total function over a closed
 * set of shapes.
 */
export type MetadataValue =
  | { type: "string"; value: string }
  | { type: "number"; value: number }
  | { type: "boolean"; value: boolean }
  | { type: "null" }
  | { type: "list"; items: MetadataValue[] }
  | { type: "map"; entries: MetadataMap };

export type MetadataMap = ReadonlyMap<string, MetadataValue>;

export function toMetadataValue(value: JsonValue): MetadataValue {
  if (value === null) return { type: "null" };
  if (typeof value === "string") return { type: "string", value };
  if (typeof value === "number") return { type: "number", value };
  if (typeof value === "boolean") return { type: "boolean", value };
  if (Array.isArray(value)) {
    return { type: "list", items: value.map(toMetadataValue) };
  }
  return { type: "map", entries: toMetadataMap(value) };
}

export function toMetadataMap(record: Record<string, JsonValue>): MetadataMap {
  const entries = new Map<string, MetadataValue>();
  for (const key of Object.keys(record).sort()) {
    entries.set(key, toMetadataValue(record[key] ?? null));
  }
  return entries;
}

export function fromMetadataValue(value: MetadataValue): JsonValue {
  switch (value.type) {
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "list":
      return value.items.map(fromMetadataValue);
    case "map":
      return fromMetadataMap(value.entries);
  }
}

export function fromMetadataMap(map: MetadataMap): Record<string, JsonValue> {
  const record: Record<string, JsonValue> = {};
  for (const [key, value] of map) {
    record[key] = fromMetadataValue(value);
  }
  return record;
}

function scalarText(value: MetadataValue): string | null {
  switch (value.type) {
    case "string":
      return value.value;
    case "number":
    case "boolean":
      return String(value.value);
    case "null":
      return "null";
    default:
      return null;
  }
}

/**
 * Flatten metadata into `key:value` tokens so it can be searched as plain
 * text. Nested map keys are joined with "." and every list element yields its
 * own token under the list's key.
 *
 * @example
 * flattenMetadata(toMetadataMap({ team: "data-platform", owners: ["ana"] }))
 * // => ["owners:ana", "team:data-platform"]
 */
export function flattenMetadata(map: MetadataMap, prefix = ""): string[] {
  const tokens: string[] = [];

  const visit = (key: string, value: MetadataValue) => {
    if (value.type === "map") {
      tokens.push(...flattenMetadata(value.entries, `${key}.`));
      return;
    }
    if (value.type === "list") {
      for (const item of value.items) visit(key, item);
      return;
    }
    const text = scalarText(value);
    if (text !== null) tokens.push(`${key}:${text}`);
  };

  for (const key of [...map.keys()].sort()) {
    const value = map.get(key);
    if (value) visit(`${prefix}${key}`, value);
  }
  return tokens;
}
