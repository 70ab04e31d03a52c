/**
 * Builds a catalog from the collections the server reports.
 */

import type { CollectionDirectory, CollectionInfo } from "./core/MongoSource.js";
import type { Catalog, CatalogStream } from "./core/types.js";

export function catalogEntry(info: CollectionInfo): CatalogStream {
  const metadata: Record<string, unknown> = {
    "table-key-properties": ["_id"],
    "database-name": info.database,
    "is-view": info.isView,
    "valid-replication-keys": ["_id"],
  };
  if (info.rowCount !== undefined) {
    metadata["row-count"] = info.rowCount;
  }
  return {
    tap_stream_id: `${info.database}-${info.name}`,
    table_name: info.name,
    stream: info.name,
    schema: { type: "object" },
    metadata: [{ breadcrumb: [], metadata }],
  };
}

/** Every collection of `databases`, or of all user databases when none are given. */
export async function discover(directory: CollectionDirectory, databases?: string[]): Promise<Catalog> {
  const names = databases && databases.length > 0 ? databases : await directory.listDatabases();
  const streams: CatalogStream[] = [];
  for (const database of names) {
    const infos = await directory.describeCollections(database);
    streams.push(...infos.map(catalogEntry));
  }
  return { streams };
}
