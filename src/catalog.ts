/**
 * Reading stream metadata out of catalog entries.
 */

import type { Document } from "mongodb";
import { ConfigurationError } from "./core/errors.js";
import type { CatalogStream } from "./core/types.js";

export type MetadataMap = Map<string, Record<string, unknown>>;

export function toMetadataMap(stream: CatalogStream): MetadataMap {
  const map: MetadataMap = new Map();
  for (const entry of stream.metadata) {
    map.set(entry.breadcrumb.join("/"), entry.metadata);
  }
  return map;
}

/** Metadata with the empty breadcrumb, i.e. about the stream itself. */
export function streamMetadata(stream: CatalogStream): Record<string, unknown> {
  return toMetadataMap(stream).get("") ?? {};
}

export function isSelected(stream: CatalogStream): boolean {
  return streamMetadata(stream)["selected"] === true;
}

export function replicationMethod(stream: CatalogStream): string | undefined {
  const method = streamMetadata(stream)["replication-method"];
  return typeof method === "string" ? method : undefined;
}

export function replicationKey(stream: CatalogStream): string {
  const key = streamMetadata(stream)["replication-key"];
  if (typeof key !== "string" || key === "") {
    throw new ConfigurationError(`No replication key defined for stream ${stream.tap_stream_id}`);
  }
  return key;
}

export function databaseName(stream: CatalogStream): string | undefined {
  const name = streamMetadata(stream)["database-name"];
  return typeof name === "string" ? name : undefined;
}

export function destinationStreamName(stream: CatalogStream, includeDatabase = false): string {
  const database = databaseName(stream);
  return includeDatabase && database ? `${database}-${stream.stream}` : stream.stream;
}

/**
 * Field projection from the `projection` metadata entry, given either as an
 * object or as a JSON string.
 */
export function projection(stream: CatalogStream): Document | undefined {
  const raw = streamMetadata(stream)["projection"];
  if (raw === undefined || raw === null || raw === "") return undefined;

  let parsed: unknown = raw;
  if (typeof raw === "string") {
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ConfigurationError(
        `The projection provided for ${stream.tap_stream_id} is not valid JSON: ${raw}`,
        e
      );
    }
  }
  if (!isDocument(parsed)) {
    throw new ConfigurationError(`The projection provided for ${stream.tap_stream_id} is not an object`);
  }
  return parsed;
}

function isDocument(value: unknown): value is Document {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
