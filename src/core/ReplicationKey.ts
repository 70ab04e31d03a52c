import { Binary, Decimal128, Long, ObjectId, Timestamp, UUID } from "mongodb";
import { BookmarkError, UnsupportedKeyTypeError } from "./errors.js";
import type { KeyType } from "./types.js";

export const KEY_TYPES = [
  "int",
  "float",
  "long",
  "string",
  "datetime",
  "ObjectId",
  "Timestamp",
  "Decimal128",
  "UUID",
  "bytes",
] as const satisfies readonly KeyType[];

/** A replication key value tagged with the type it is bookmarked under. */
export type KeyValue =
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "long"; value: Long }
  | { type: "string"; value: string }
  | { type: "datetime"; value: Date }
  | { type: "ObjectId"; value: ObjectId }
  | { type: "Timestamp"; value: Timestamp }
  | { type: "Decimal128"; value: Decimal128 }
  | { type: "UUID"; value: UUID }
  | { type: "bytes"; value: Binary };

export type NativeKey = KeyValue["value"];

export interface EncodedKey {
  value: string;
  type: KeyType;
}

const INTEGER_RE = /^-?\d+$/;
const TIMESTAMP_RE = /^(\d+)\.(\d+)$/;
const BYTES_RE = /^(\d{1,3}):([A-Za-z0-9+/]*={0,2})$/;

export function isKeyType(type: string): type is KeyType {
  return (KEY_TYPES as readonly string[]).includes(type);
}

/**
 * Tags a value read from the source with its key type.
 * Throws UnsupportedKeyTypeError for anything that cannot be bookmarked.
 */
export function toKeyValue(value: unknown): KeyValue {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? { type: "int", value } : { type: "float", value };
  }
  if (typeof value === "bigint") return { type: "long", value: Long.fromBigInt(value) };
  if (typeof value === "string") return { type: "string", value };
  if (value instanceof Date) return { type: "datetime", value };
  // Timestamp extends Long, so it has to be matched first.
  if (value instanceof Timestamp) return { type: "Timestamp", value };
  if (value instanceof Long) return { type: "long", value };
  if (value instanceof ObjectId) return { type: "ObjectId", value };
  if (value instanceof Decimal128) return { type: "Decimal128", value };
  if (value instanceof UUID) return { type: "UUID", value };
  if (value instanceof Binary) {
    return value.sub_type === Binary.SUBTYPE_UUID
      ? { type: "UUID", value: value.toUUID() }
      : { type: "bytes", value };
  }
  throw new UnsupportedKeyTypeError(typeNameOf(value));
}

export function serializeKey(key: KeyValue): string {
  switch (key.type) {
    case "int":
    case "float":
      return String(key.value);
    case "long":
    case "Decimal128":
      return key.value.toString();
    case "string":
      return key.value;
    case "datetime":
      return key.value.toISOString();
    case "ObjectId":
      return key.value.toHexString();
    case "Timestamp":
      return `${key.value.t}.${key.value.i}`;
    case "UUID":
      return key.value.toHexString(true);
    case "bytes":
      return `${key.value.sub_type}:${key.value.toString("base64")}`;
  }
}

export function encodeKey(value: unknown): EncodedKey {
  const key = toKeyValue(value);
  return { value: serializeKey(key), type: key.type };
}

/** Parses a stored bookmark back into the tagged value it was written from. */
export function parseKey(raw: string, type: string): KeyValue {
  if (!isKeyType(type)) {
    throw new BookmarkError(`Unknown replication key type "${type}"`);
  }
  try {
    return parseTyped(raw, type);
  } catch (e) {
    if (e instanceof BookmarkError) throw e;
    throw new BookmarkError(`Cannot decode ${type} bookmark "${raw}"`, e);
  }
}

export function decodeKey(raw: string, type: string): NativeKey {
  return parseKey(raw, type).value;
}

function parseTyped(raw: string, type: KeyType): KeyValue {
  const malformed = () => new BookmarkError(`Malformed ${type} bookmark "${raw}"`);

  switch (type) {
    case "int": {
      const value = Number(raw);
      if (!INTEGER_RE.test(raw) || !Number.isSafeInteger(value)) throw malformed();
      return { type, value };
    }
    case "float": {
      const value = Number(raw);
      if (raw.trim() === "" || (Number.isNaN(value) && raw !== "NaN")) throw malformed();
      return { type, value };
    }
    case "long":
      if (!INTEGER_RE.test(raw)) throw malformed();
      return { type, value: Long.fromString(raw) };
    case "string":
      return { type, value: raw };
    case "datetime": {
      const value = new Date(raw);
      if (Number.isNaN(value.getTime())) throw malformed();
      return { type, value };
    }
    case "ObjectId":
      if (!/^[0-9a-fA-F]{24}$/.test(raw)) throw malformed();
      return { type, value: ObjectId.createFromHexString(raw) };
    case "Timestamp": {
      const match = TIMESTAMP_RE.exec(raw);
      if (!match) throw malformed();
      return { type, value: new Timestamp({ t: Number(match[1]), i: Number(match[2]) }) };
    }
    case "Decimal128":
      return { type, value: Decimal128.fromString(raw) };
    case "UUID":
      return { type, value: new UUID(raw) };
    case "bytes": {
      // "<subtype>:<base64>"
      const match = BYTES_RE.exec(raw);
      const subtype = Number(match?.[1]);
      const data = match?.[2];
      if (data === undefined || subtype > 0xff || data.length % 4 !== 0) throw malformed();
      return { type, value: Binary.createFromBase64(data, subtype) };
    }
  }
}

function typeNameOf(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  return typeof value;
}
