import { MongoClient } from "mongodb";
import { databaseName } from "../catalog.js";
import { ConfigurationError } from "./errors.js";
import type { CatalogStream, Query, Source, SourceCursor } from "./types.js";

export interface CollectionInfo {
  database: string;
  name: string;
  isView: boolean;
  rowCount?: number;
}

export interface CollectionDirectory {
  listDatabases(): Promise<string[]>;
  describeCollections(database: string): Promise<CollectionInfo[]>;
}

const INTERNAL_DATABASES = new Set(["admin", "local", "config"]);

export class MongoSource implements Source, CollectionDirectory {
  private client: MongoClient;

  constructor(
    uri: string,
    private defaultDatabase?: string
  ) {
    this.client = new MongoClient(uri);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  find(stream: CatalogStream, query: Query): SourceCursor {
    const database = databaseName(stream) ?? this.defaultDatabase;
    if (!database) {
      throw new ConfigurationError(`No database-name in metadata for stream ${stream.tap_stream_id}`);
    }
    return this.client
      .db(database)
      .collection(stream.stream)
      .find(query.filter, { sort: query.sort, projection: query.projection });
  }

  async listDatabases(): Promise<string[]> {
    const { databases } = await this.client.db("admin").admin().listDatabases({ nameOnly: true });
    return databases.map((d) => d.name).filter((name) => !INTERNAL_DATABASES.has(name));
  }

  async describeCollections(database: string): Promise<CollectionInfo[]> {
    const db = this.client.db(database);
    const collections = await db.listCollections({}, { nameOnly: false }).toArray();
    const infos: CollectionInfo[] = [];
    for (const c of collections) {
      if (c.name.startsWith("system.")) continue;
      const isView = c.type === "view";
      const info: CollectionInfo = { database, name: c.name, isView };
      if (!isView) {
        info.rowCount = await db.collection(c.name).estimatedDocumentCount();
      }
      infos.push(info);
    }
    return infos;
  }
}
