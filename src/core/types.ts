import type { Document } from "mongodb";

export type KeyType =
  | "int"
  | "float"
  | "long"
  | "string"
  | "datetime"
  | "ObjectId"
  | "Timestamp"
  | "Decimal128"
  | "UUID"
  | "bytes";

export interface StreamBookmark {
  /** Dataset generation; minted on the first run and reused until a pass completes */
  version?: number;
  replication_key_value?: string;
  /** One of KeyType once written by this tool; anything else fails when the next query is built */
  replication_key_type?: string;
}

export interface State {
  bookmarks: Record<string, StreamBookmark>;
  currently_syncing?: string | null;
}

export interface MetadataEntry {
  breadcrumb: string[];
  metadata: Record<string, unknown>;
}

export interface JsonSchema {
  type?: string | string[];
  format?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  [key: string]: unknown;
}

export interface CatalogStream {
  tap_stream_id: string;
  /** Collection name */
  stream: string;
  table_name?: string;
  schema: Record<string, unknown>;
  metadata: MetadataEntry[];
}

export interface Catalog {
  streams: CatalogStream[];
}

export type Row = Document;

export interface SchemaMessage {
  type: "SCHEMA";
  stream: string;
  schema: JsonSchema;
  key_properties: string[];
}

export interface RecordMessage {
  type: "RECORD";
  stream: string;
  record: Record<string, unknown>;
  version: number;
  time_extracted: string;
}

export interface StateMessage {
  type: "STATE";
  value: State;
}

export interface ActivateVersionMessage {
  type: "ACTIVATE_VERSION";
  stream: string;
  version: number;
}

export type Message = SchemaMessage | RecordMessage | StateMessage | ActivateVersionMessage;

export interface Query {
  filter: Document;
  sort: Record<string, 1>;
  projection?: Document;
}

export interface SourceCursor extends AsyncIterable<Row> {
  close(): Promise<void>;
}

export interface Source {
  /**
   * Opens a cursor over the stream's collection.
   * Rows must arrive in the order given by `query.sort`.
   */
  find(stream: CatalogStream, query: Query): SourceCursor;
}

export interface Sink {
  write(message: Message): Promise<void>;
}

export interface MetricsCollector {
  schemaChange(streamId: string): void;
  schemaTime(streamId: string, ms: number): void;
  rowsSynced(streamId: string, count: number): void;
  syncTime(streamId: string, ms: number): void;
}
