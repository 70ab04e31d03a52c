/**
 * Config, catalog and state file loading. Every input is validated with zod
 * before anything touches the database.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./core/errors.js";
import { DEFAULT_CHECKPOINT_PERIOD } from "./core/IncrementalSync.js";
import type { Catalog, State } from "./core/types.js";

export const ConfigSchema = z.object({
  connection_uri: z.string().min(1).optional(),
  /** Database to discover; streams carry their own database-name when syncing */
  database: z.string().min(1).optional(),
  include_schemas_in_destination_stream_name: z.boolean().default(false),
  update_bookmark_period: z.number().int().positive().default(DEFAULT_CHECKPOINT_PERIOD),
  /** SQLite file that keeps the last STATE between runs */
  state_db_path: z.string().min(1).optional(),
});

export type TapConfig = z.infer<typeof ConfigSchema> & { connection_uri: string };

const MetadataEntrySchema = z.object({
  breadcrumb: z.array(z.string()),
  metadata: z.record(z.string(), z.unknown()),
});

const CatalogStreamSchema = z.object({
  tap_stream_id: z.string().min(1),
  stream: z.string().min(1),
  table_name: z.string().optional(),
  schema: z.record(z.string(), z.unknown()).default({}),
  metadata: z.array(MetadataEntrySchema).default([]),
});

export const CatalogSchema = z.object({
  streams: z.array(CatalogStreamSchema),
});

const StreamBookmarkSchema = z.object({
  version: z.number().int().optional(),
  replication_key_value: z.string().optional(),
  replication_key_type: z.string().optional(),
});

export const StateSchema = z.object({
  bookmarks: z.record(z.string(), StreamBookmarkSchema).default({}),
  currently_syncing: z.string().nullable().optional(),
});

type Env = Record<string, string | undefined>;

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid ${what}: ${issues.join("; ")}`, result.error.issues);
  }
  return result.data;
}

function readJson(path: string, what: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (e) {
    throw new ConfigurationError(`Cannot read ${what} file ${path}: ${errorMessage(e)}`);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`${what} file ${path} is not valid JSON: ${errorMessage(e)}`);
  }
}

/**
 * Environment fills in what the file leaves out:
 * MONGODB_URI, MONGODB_DATABASE and TIDEMARK_STATE_DB.
 */
export function parseConfig(raw: unknown, env: Env = process.env): TapConfig {
  const parsed = validate(ConfigSchema, raw, "config");
  const connectionUri = parsed.connection_uri ?? env.MONGODB_URI;
  if (!connectionUri) {
    throw new ConfigurationError("Missing connection_uri in config (or MONGODB_URI in the environment)");
  }
  const database = parsed.database ?? env.MONGODB_DATABASE;
  const stateDbPath = parsed.state_db_path ?? env.TIDEMARK_STATE_DB;
  return {
    ...parsed,
    connection_uri: connectionUri,
    ...(database ? { database } : {}),
    ...(stateDbPath ? { state_db_path: stateDbPath } : {}),
  };
}

export function parseCatalog(raw: unknown): Catalog {
  return validate(CatalogSchema, raw, "catalog");
}

export function parseState(raw: unknown): State {
  return validate(StateSchema, raw ?? {}, "state");
}

export function loadConfig(path: string, env: Env = process.env): TapConfig {
  return parseConfig(readJson(path, "config"), env);
}

export function loadCatalog(path: string): Catalog {
  return parseCatalog(readJson(path, "catalog"));
}

export function loadState(path: string): State {
  return parseState(readJson(path, "state"));
}
