#!/usr/bin/env node
/**
 * Tidemark — command-line interface.
 */

import { config } from "dotenv";
import { loadCatalog, loadConfig, loadState } from "./config.js";
import { emptyState } from "./core/BookmarkManager.js";
import { ConfigurationError, errorMessage, TapError } from "./core/errors.js";
import { JsonLinesSink } from "./core/JsonLinesSink.js";
import { MongoSource } from "./core/MongoSource.js";
import type { Sink, State } from "./core/types.js";
import { CheckpointStore, getDb, persistingSink } from "./db.js";
import { discover } from "./discovery.js";
import { createLogger } from "./log.js";
import { runSync } from "./tap.js";

const logger = () => createLogger("cli");

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  const command = args[0] ?? "";
  const flags: Record<string, string> = {};
  for (let i = 1; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) continue;
    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
    } else if (args[i + 1] !== undefined && !args[i + 1]?.startsWith("--")) {
      flags[arg.slice(2)] = args[i + 1] ?? "";
      i++;
    } else {
      flags[arg.slice(2)] = "";
    }
  }
  return { command, flags };
}

function required(flags: Record<string, string>, name: string): string {
  const value = flags[name];
  if (!value) {
    throw new ConfigurationError(`Missing --${name} <file>`);
  }
  return value;
}

async function discoverCommand(flags: Record<string, string>): Promise<void> {
  const cfg = loadConfig(required(flags, "config"));
  const source = new MongoSource(cfg.connection_uri, cfg.database);
  await source.connect();
  try {
    const catalog = await discover(source, cfg.database ? [cfg.database] : undefined);
    process.stdout.write(`${JSON.stringify(catalog, null, 2)}\n`);
    logger().info(`Discovered ${catalog.streams.length} streams`);
  } finally {
    await source.close();
  }
}

async function syncCommand(flags: Record<string, string>): Promise<void> {
  const cfg = loadConfig(required(flags, "config"));
  const catalog = loadCatalog(required(flags, "catalog"));

  const db = cfg.state_db_path ? getDb(cfg.state_db_path) : undefined;
  const store = db ? new CheckpointStore(db) : undefined;
  const statePath = flags["state"];
  const state: State = statePath ? loadState(statePath) : (store?.load() ?? emptyState());

  let sink: Sink = new JsonLinesSink(process.stdout);
  if (store) {
    sink = persistingSink(sink, store);
  }

  const source = new MongoSource(cfg.connection_uri, cfg.database);
  await source.connect();
  try {
    await runSync({
      source,
      sink,
      catalog,
      state,
      checkpointPeriod: cfg.update_bookmark_period,
      includeDatabaseInStreamName: cfg.include_schemas_in_destination_stream_name,
    });
  } finally {
    await source.close();
    db?.close();
  }
}

async function main(): Promise<void> {
  config();
  const { command, flags } = parseArgs(process.argv);

  if (command === "discover") {
    await discoverCommand(flags);
    return;
  }

  if (command === "sync") {
    await syncCommand(flags);
    return;
  }

  console.error("Tidemark");
  console.error("  discover --config <file>                                 Print a catalog of collections.");
  console.error("  sync --config <file> --catalog <file> [--state <file>]   Extract selected streams incrementally.");
  if (command !== "" && command !== "help") {
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  const log = logger();
  if (err instanceof TapError) {
    log.error(`${err.code}: ${err.message}`);
  } else {
    log.error(errorMessage(err));
    console.error(err);
  }
  process.exit(1);
});
