/**
 * Runs incremental sync over every selected stream in a catalog.
 */

import { isSelected, replicationMethod } from "./catalog.js";
import { BookmarkManager } from "./core/BookmarkManager.js";
import { ConfigurationError } from "./core/errors.js";
import { IncrementalSync } from "./core/IncrementalSync.js";
import { InMemoryMetrics } from "./core/Metrics.js";
import type { Catalog, CatalogStream, Sink, Source, State } from "./core/types.js";
import { createLogger, type Logger } from "./log.js";

export interface SyncRun {
  source: Source;
  sink: Sink;
  catalog: Catalog;
  state: State;
  checkpointPeriod?: number;
  includeDatabaseInStreamName?: boolean;
  metrics?: InMemoryMetrics;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Selected streams, resuming the interrupted one first, then streams that
 * have never been synced, then the rest.
 */
export function streamsToSync(catalog: Catalog, state: State): CatalogStream[] {
  const selected = catalog.streams.filter(isSelected);
  const fresh = selected.filter((s) => !state.bookmarks[s.tap_stream_id]);
  const seen = selected.filter((s) => state.bookmarks[s.tap_stream_id]);
  const ordered = [...fresh, ...seen];

  const current = state.currently_syncing;
  if (!current) return ordered;
  return [
    ...ordered.filter((s) => s.tap_stream_id === current),
    ...ordered.filter((s) => s.tap_stream_id !== current),
  ];
}

export async function runSync(run: SyncRun): Promise<State> {
  const log = run.logger ?? createLogger("tap");
  const metrics = run.metrics ?? new InMemoryMetrics();
  const clock = run.clock ?? (() => new Date());
  const streams = streamsToSync(run.catalog, run.state);

  for (const stream of streams) {
    const method = replicationMethod(stream);
    if (method !== "INCREMENTAL") {
      throw new ConfigurationError(
        `Stream ${stream.tap_stream_id} uses replication method ${method ?? "(none)"}; only INCREMENTAL is supported`
      );
    }
  }

  const bookmarks = new BookmarkManager(run.state, () => clock().getTime());
  const sync = new IncrementalSync(run.source, run.sink, bookmarks, {
    checkpointPeriod: run.checkpointPeriod,
    includeDatabaseInStreamName: run.includeDatabaseInStreamName,
    metrics,
    logger: log,
    now: clock,
  });

  if (streams.length === 0) {
    log.warn("No streams selected");
  }

  for (const stream of streams) {
    bookmarks.setCurrentlySyncing(stream.tap_stream_id);
    await sync.emitState();
    await sync.syncCollection(stream);
  }

  bookmarks.setCurrentlySyncing(null);
  await sync.emitState();

  for (const line of metrics.summary()) {
    log.info(line);
  }
  return bookmarks.current;
}
