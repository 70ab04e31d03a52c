import { encodeKey } from "./ReplicationKey.js";
import type { Row, State, StreamBookmark } from "./types.js";

export interface FilterBound {
  keyName: string;
  value: string;
  type: string;
}

export function emptyState(): State {
  return { bookmarks: {} };
}

/** Looks up `a.b.c` style key names inside nested documents. */
export function getPath(row: Row, path: string): unknown {
  if (Object.hasOwn(row, path)) return row[path];
  let current: unknown = row;
  for (const part of path.split(".")) {
    if (current === null || typeof current !== "object" || !Object.hasOwn(current, part)) return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

/**
 * Owns the per-stream bookmarks inside the process-wide state.
 * The state object is mutated in place; callers snapshot it when emitting.
 */
export class BookmarkManager {
  constructor(
    private state: State,
    private now: () => number = Date.now
  ) {}

  get current(): State {
    return this.state;
  }

  bookmark(streamId: string): StreamBookmark {
    return this.state.bookmarks[streamId] ?? {};
  }

  isFirstRun(streamId: string): boolean {
    return this.bookmark(streamId).version === undefined;
  }

  /**
   * Mints a new version on a first run, otherwise keeps the stored one.
   * Written back straight away so an interrupted run continues the same generation.
   */
  resolveVersion(streamId: string): number {
    const version = this.bookmark(streamId).version ?? this.now();
    this.write(streamId, { version });
    return version;
  }

  currentFilterBound(streamId: string, keyName: string): FilterBound | undefined {
    const { replication_key_value: value, replication_key_type: type } = this.bookmark(streamId);
    if (value === undefined) return undefined;
    // a value stored without its type is corrupt and must fail at query build
    return { keyName, value, type: type ?? "" };
  }

  advance(streamId: string, row: Row, keyName: string): void {
    const raw = getPath(row, keyName);
    if (raw === undefined || raw === null) return;

    const key = encodeKey(raw);
    this.write(streamId, {
      replication_key_value: key.value,
      replication_key_type: key.type,
    });
  }

  setCurrentlySyncing(streamId: string | null): void {
    this.state.currently_syncing = streamId;
  }

  private write(streamId: string, patch: StreamBookmark): void {
    this.state.bookmarks[streamId] = { ...this.state.bookmarks[streamId], ...patch };
  }
}
