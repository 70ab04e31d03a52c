import {
  BSONRegExp,
  BSONSymbol,
  Binary,
  Code,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
} from "mongodb";
import type { JsonSchema, Row } from "./types.js";

export interface ObjectSchema extends JsonSchema {
  type: "object";
  properties: Record<string, JsonSchema>;
}

export interface SchemaMerge {
  schema: ObjectSchema;
  changed: boolean;
}

export function emptySchema(): ObjectSchema {
  return { type: "object", properties: {} };
}

const nullable = (...types: string[]): JsonSchema => ({ type: ["null", ...types] });

/** JSON schema for a single value, matching what rowToRecord turns it into. */
export function inferFieldSchema(value: unknown): JsonSchema {
  if (value === null || value === undefined) return {};
  if (typeof value === "boolean") return nullable("boolean");
  if (typeof value === "number") return Number.isSafeInteger(value) ? nullable("integer") : nullable("number");
  if (typeof value === "string") return nullable("string");
  if (value instanceof Date || value instanceof Timestamp) {
    return { ...nullable("string"), format: "date-time" };
  }
  if (typeof value === "bigint" || value instanceof Long) return nullable("integer", "string");
  if (value instanceof Int32) return nullable("integer");
  if (value instanceof Double) return inferFieldSchema(value.value);
  if (
    value instanceof ObjectId ||
    value instanceof Decimal128 ||
    value instanceof Binary ||
    value instanceof RegExp ||
    value instanceof BSONRegExp ||
    value instanceof Code ||
    value instanceof BSONSymbol ||
    value instanceof MinKey ||
    value instanceof MaxKey
  ) {
    return nullable("string");
  }
  if (Array.isArray(value)) return { ...nullable("array"), items: {} };
  if (typeof value === "object") return nullable("object");
  return {};
}

/**
 * Adds every field of `row` that the schema has not seen yet.
 *
 * Only field names are compared: a known field arriving later with a
 * different value type leaves the schema untouched.
 */
export function mergeSchema(schema: ObjectSchema, row: Row): SchemaMerge {
  const added: Record<string, JsonSchema> = {};
  for (const [field, value] of Object.entries(row)) {
    if (!Object.hasOwn(schema.properties, field) && !Object.hasOwn(added, field)) {
      added[field] = inferFieldSchema(value);
    }
  }

  if (Object.keys(added).length === 0) {
    return { schema, changed: false };
  }
  return {
    schema: { ...schema, properties: { ...schema.properties, ...added } },
    changed: true,
  };
}
