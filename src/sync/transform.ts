import { DateTime, Option } from "effect";
import type { PropertySchema } from "../catalog/catalog";
import type { RawRecord } from "../extraction/types";

// added by the API to every record and nested object
const METADATA_KEYS = new Set(["attributes"]);

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const typesOf = (schema: PropertySchema): ReadonlyArray<string> => {
  if (schema.type === undefined) return [];
  return typeof schema.type === "string" ? [schema.type] : schema.type;
};

const isObject = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stripMetadata = (
  value: RawRecord,
  properties: PropertySchema["properties"]
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (METADATA_KEYS.has(key)) continue;
    const schema = properties?.[key];
    result[key] = schema === undefined ? nested : normalize(nested, schema);
  }
  return result;
};

/**
 * Repairs applied at every level before field fixes: metadata keys go,
 * integer fields drop a `.0` and empty text becomes null where allowed.
 */
const normalize = (value: unknown, schema: PropertySchema): unknown => {
  if (isObject(value)) return stripMetadata(value, schema.properties);
  const types = typesOf(schema);
  if (value === "0.0" && types.includes("integer")) return "0";
  if (value === "" && types.includes("null")) return null;
  return value;
};

/**
 * Best-effort typing of a field whose source type is unknown.
 */
export const coerceUntyped = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  if (NUMERIC.test(value)) return Number(value);
  if (value === "true" || value === "false") return value === "true";
  if (value === "") return null;
  return value;
};

const fixField = (value: unknown, schema: PropertySchema): unknown => {
  if (schema.type === undefined) return coerceUntyped(value);
  if (typesOf(schema).includes("number")) return value === "-" ? "" : value;
  if (schema.format === "date-time") {
    if (typeof value === "string") return value.toLowerCase() === "<null>" ? "" : value;
    if (typeof value === "number") {
      return Option.match(DateTime.make(value), {
        onNone: () => value,
        onSome: DateTime.formatIso,
      });
    }
  }
  return value;
};

/**
 * Shapes a raw record to its stream schema. Fields outside the schema are
 * dropped. Never fails: a value that cannot be repaired passes through.
 */
export const transformRecord = (
  record: RawRecord,
  schema: PropertySchema
): Record<string, unknown> => {
  const properties = schema.properties ?? {};
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(stripMetadata(record, properties))) {
    const property = properties[key];
    if (property === undefined) continue;
    result[key] = fixField(value, property);
  }
  return result;
};
