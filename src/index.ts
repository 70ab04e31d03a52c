export { BookmarkManager, emptyState, getPath, type FilterBound } from "./core/BookmarkManager.js";
export * from "./core/errors.js";
export { IncrementalSync, DEFAULT_CHECKPOINT_PERIOD, type IncrementalSyncOptions } from "./core/IncrementalSync.js";
export { JsonLinesSink } from "./core/JsonLinesSink.js";
export { InMemoryMetrics, noopMetrics, type StreamMetrics } from "./core/Metrics.js";
export { MongoSource, type CollectionDirectory, type CollectionInfo } from "./core/MongoSource.js";
export { buildFilter, buildQuery } from "./core/QueryBuilder.js";
export { rowToRecord, toJsonValue, type JsonValue } from "./core/RecordTransform.js";
export { decodeKey, encodeKey, parseKey, KEY_TYPES, type EncodedKey, type KeyValue } from "./core/ReplicationKey.js";
export { emptySchema, inferFieldSchema, mergeSchema, type ObjectSchema } from "./core/SchemaInference.js";
export type * from "./core/types.js";
export { parseCatalog, parseConfig, parseState, type TapConfig } from "./config.js";
export { CheckpointStore, persistingSink } from "./db.js";
export { catalogEntry, discover } from "./discovery.js";
export { runSync, streamsToSync, type SyncRun } from "./tap.js";
