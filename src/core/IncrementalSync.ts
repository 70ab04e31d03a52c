import { BSON } from "mongodb";
import { destinationStreamName, projection, replicationKey } from "../catalog.js";
import { createLogger, type Logger } from "../log.js";
import type { BookmarkManager } from "./BookmarkManager.js";
import { SinkError, SourceError, TapError, errorMessage } from "./errors.js";
import { noopMetrics } from "./Metrics.js";
import { buildQuery } from "./QueryBuilder.js";
import { rowToRecord } from "./RecordTransform.js";
import { emptySchema, mergeSchema } from "./SchemaInference.js";
import type {
  ActivateVersionMessage,
  CatalogStream,
  Message,
  MetricsCollector,
  Query,
  Row,
  Sink,
  Source,
  SourceCursor,
} from "./types.js";

export const DEFAULT_CHECKPOINT_PERIOD = 10_000;

export interface IncrementalSyncOptions {
  /** Rows between STATE messages while streaming */
  checkpointPeriod?: number;
  includeDatabaseInStreamName?: boolean;
  metrics?: MetricsCollector;
  logger?: Logger;
  /** Clock for time_extracted */
  now?: () => Date;
}

/**
 * Extracts one collection at a time, resuming from the stream's bookmark.
 *
 * Emits ACTIVATE_VERSION up front on a first run, a STATE snapshot before
 * querying and every `checkpointPeriod` rows, and ACTIVATE_VERSION again
 * once the cursor is exhausted. Any failure aborts the stream; the last
 * STATE emitted is where the next run picks up.
 */
export class IncrementalSync {
  private checkpointPeriod: number;
  private metrics: MetricsCollector;
  private log: Logger;
  private now: () => Date;

  constructor(
    private source: Source,
    private sink: Sink,
    private bookmarks: BookmarkManager,
    private options: IncrementalSyncOptions = {}
  ) {
    this.checkpointPeriod = options.checkpointPeriod ?? DEFAULT_CHECKPOINT_PERIOD;
    if (!Number.isInteger(this.checkpointPeriod) || this.checkpointPeriod < 1) {
      throw new RangeError(`checkpointPeriod must be a positive integer, got ${this.checkpointPeriod}`);
    }
    this.metrics = options.metrics ?? noopMetrics;
    this.log = options.logger ?? createLogger("incremental");
    this.now = options.now ?? (() => new Date());
  }

  /** Returns the number of records emitted. */
  async syncCollection(stream: CatalogStream): Promise<number> {
    const streamId = stream.tap_stream_id;
    const keyName = replicationKey(stream);
    const fields = projection(stream);
    const destination = destinationStreamName(stream, this.options.includeDatabaseInStreamName);

    this.log.info(`Starting incremental sync for ${streamId}`);

    const firstRun = this.bookmarks.isFirstRun(streamId);
    const version = this.bookmarks.resolveVersion(streamId);
    const activateVersion: ActivateVersionMessage = { type: "ACTIVATE_VERSION", stream: destination, version };

    // let downstream show the new generation's rows as they arrive
    if (firstRun) {
      await this.emit(activateVersion);
    }
    await this.emitState();

    const query = buildQuery(this.bookmarks.currentFilterBound(streamId, keyName), keyName, fields);
    this.log.info(`Querying ${streamId} with: ${describeQuery(query)}`);

    const cursor = this.open(stream, query);
    const timeExtracted = this.now().toISOString();
    const started = performance.now();
    let schema = emptySchema();
    let rowsSaved = 0;

    try {
      for await (const row of readRows(cursor, streamId)) {
        const schemaStarted = performance.now();
        const merged = mergeSchema(schema, row);
        if (merged.changed) {
          schema = merged.schema;
          await this.emit({ type: "SCHEMA", stream: destination, schema, key_properties: ["_id"] });
          this.metrics.schemaChange(streamId);
        }
        this.metrics.schemaTime(streamId, performance.now() - schemaStarted);

        await this.emit({
          type: "RECORD",
          stream: destination,
          record: rowToRecord(row),
          version,
          time_extracted: timeExtracted,
        });
        rowsSaved += 1;

        this.bookmarks.advance(streamId, row, keyName);

        if (rowsSaved % this.checkpointPeriod === 0) {
          await this.emitState();
        }
      }
    } catch (e) {
      await cursor.close().catch((closeErr: unknown) => {
        this.log.warn(`Closing cursor for ${streamId} failed: ${errorMessage(closeErr)}`);
      });
      throw e;
    }
    try {
      await cursor.close();
    } catch (e) {
      throw new SourceError(`Closing cursor for ${streamId} failed: ${errorMessage(e)}`, e);
    }

    this.metrics.rowsSynced(streamId, rowsSaved);
    this.metrics.syncTime(streamId, performance.now() - started);

    await this.emit(activateVersion);

    this.log.info(`Synced ${rowsSaved} records for ${streamId}`);
    return rowsSaved;
  }

  async emitState(): Promise<void> {
    await this.emit({ type: "STATE", value: structuredClone(this.bookmarks.current) });
  }

  private open(stream: CatalogStream, query: Query): SourceCursor {
    try {
      return this.source.find(stream, query);
    } catch (e) {
      throw new SourceError(`Could not query ${stream.tap_stream_id}: ${errorMessage(e)}`, e);
    }
  }

  private async emit(message: Message): Promise<void> {
    try {
      await this.sink.write(message);
    } catch (e) {
      if (e instanceof TapError) throw e;
      throw new SinkError(`Writing ${message.type} message failed: ${errorMessage(e)}`, e);
    }
  }
}

async function* readRows(cursor: SourceCursor, streamId: string): AsyncGenerator<Row> {
  const iterator = cursor[Symbol.asyncIterator]();
  while (true) {
    let next: IteratorResult<Row>;
    try {
      next = await iterator.next();
    } catch (e) {
      throw new SourceError(`Reading ${streamId} failed: ${errorMessage(e)}`, e);
    }
    if (next.done) return;
    yield next.value;
  }
}

function describeQuery(query: Query): string {
  return BSON.EJSON.stringify({ find: query.filter, projection: query.projection ?? null }, { relaxed: true });
}
