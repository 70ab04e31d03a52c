import type { MetricsCollector } from "./types.js";

export interface StreamMetrics {
  rows: number;
  syncMs: number;
  schemaChanges: number;
  schemaMs: number;
}

export class InMemoryMetrics implements MetricsCollector {
  private streams = new Map<string, StreamMetrics>();

  schemaChange(streamId: string): void {
    this.entry(streamId).schemaChanges += 1;
  }

  schemaTime(streamId: string, ms: number): void {
    this.entry(streamId).schemaMs += ms;
  }

  rowsSynced(streamId: string, count: number): void {
    this.entry(streamId).rows += count;
  }

  syncTime(streamId: string, ms: number): void {
    this.entry(streamId).syncMs += ms;
  }

  get(streamId: string): StreamMetrics | undefined {
    return this.streams.get(streamId);
  }

  /** One line per stream, in the order streams were first seen. */
  summary(): string[] {
    return [...this.streams].map(
      ([id, m]) =>
        `${id}: ${m.rows} rows in ${(m.syncMs / 1000).toFixed(2)}s, ` +
        `${m.schemaChanges} schema changes (${(m.schemaMs / 1000).toFixed(2)}s building schemas)`
    );
  }

  private entry(streamId: string): StreamMetrics {
    let m = this.streams.get(streamId);
    if (!m) {
      m = { rows: 0, syncMs: 0, schemaChanges: 0, schemaMs: 0 };
      this.streams.set(streamId, m);
    }
    return m;
  }
}

/** For callers that do not report metrics. */
export const noopMetrics: MetricsCollector = {
  schemaChange() {},
  schemaTime() {},
  rowsSynced() {},
  syncTime() {},
};
