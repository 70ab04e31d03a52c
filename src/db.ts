/**
 * Local SQLite store for the last checkpointed state.
 */

import path from "node:path";
import Database from "better-sqlite3";
import { parseState } from "./config.js";
import type { Message, Sink, State } from "./core/types.js";

const DB_PATH = process.env.TIDEMARK_STATE_DB ?? path.join(process.cwd(), "tidemark.db");

export function getDb(file: string = DB_PATH): Database.Database {
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.exec(`
    CREATE TABLE IF NOT EXISTS sync_state (
      key TEXT PRIMARY KEY,
      value TEXT,
      updated_at INTEGER
    );
  `);
  return db;
}

export class CheckpointStore {
  constructor(
    private db: Database.Database,
    private key = "state"
  ) {}

  load(): State | undefined {
    const row = this.db.prepare("SELECT value FROM sync_state WHERE key = ?").get(this.key) as
      | { value: string | null }
      | undefined;
    if (row?.value == null) return undefined;
    return parseState(JSON.parse(row.value));
  }

  save(state: State): void {
    this.db
      .prepare(
        `INSERT INTO sync_state (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(this.key, JSON.stringify(state), Date.now());
  }
}

/** Forwards every message, then records STATE values in the store. */
export function persistingSink(sink: Sink, store: CheckpointStore): Sink {
  return {
    async write(message: Message) {
      await sink.write(message);
      if (message.type === "STATE") {
        store.save(message.value);
      }
    },
  };
}

export { DB_PATH };
