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
import type { Row } from "./types.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Converts a value read through the driver into something JSON.stringify
 * writes without loss of meaning. Values with no JSON form become strings.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return longToJson(Long.fromBigInt(value));
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Timestamp) return new Date(value.t * 1000).toISOString();
  if (value instanceof Long) return longToJson(value);
  if (value instanceof ObjectId) return value.toHexString();
  if (value instanceof Decimal128) return value.toString();
  if (value instanceof Binary) {
    return value.sub_type === Binary.SUBTYPE_UUID ? value.toUUID().toHexString(true) : value.toString("base64");
  }
  if (value instanceof Double || value instanceof Int32) return toJsonValue(value.value);
  if (value instanceof RegExp) return String(value);
  if (value instanceof BSONRegExp) return `/${value.pattern}/${value.options}`;
  if (value instanceof Code) return value.code;
  if (value instanceof BSONSymbol) return value.value;
  if (value instanceof MinKey) return "MinKey";
  if (value instanceof MaxKey) return "MaxKey";
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = toJsonValue(v);
    }
    return out;
  }
  return String(value);
}

export function rowToRecord(row: Row): Record<string, JsonValue> {
  const record: Record<string, JsonValue> = {};
  for (const [field, value] of Object.entries(row)) {
    record[field] = toJsonValue(value);
  }
  return record;
}

function longToJson(value: Long): number | string {
  const n = value.toNumber();
  return Number.isSafeInteger(n) ? n : value.toString();
}
