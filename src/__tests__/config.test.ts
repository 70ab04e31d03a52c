import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadCatalog, loadConfig, loadState, parseCatalog, parseConfig, parseState } from "../config.js";
import { ConfigurationError } from "../core/errors.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    expect(parseConfig({ connection_uri: "mongodb://localhost:27017" }, {})).toEqual({
      connection_uri: "mongodb://localhost:27017",
      include_schemas_in_destination_stream_name: false,
      update_bookmark_period: 10_000,
    });
  });

  it("fills gaps from the environment", () => {
    const config = parseConfig(
      { update_bookmark_period: 500 },
      { MONGODB_URI: "mongodb://env:27017", MONGODB_DATABASE: "shop", TIDEMARK_STATE_DB: "/tmp/state.db" }
    );
    expect(config).toEqual({
      connection_uri: "mongodb://env:27017",
      database: "shop",
      state_db_path: "/tmp/state.db",
      include_schemas_in_destination_stream_name: false,
      update_bookmark_period: 500,
    });
  });

  it("prefers the file over the environment", () => {
    const config = parseConfig({ connection_uri: "mongodb://file:27017" }, { MONGODB_URI: "mongodb://env:27017" });
    expect(config.connection_uri).toBe("mongodb://file:27017");
  });

  it("requires a connection uri", () => {
    expect(() => parseConfig({}, {})).toThrow(ConfigurationError);
  });

  it("lists every invalid field", () => {
    expect(() => parseConfig({ connection_uri: "x", update_bookmark_period: 0, include_schemas_in_destination_stream_name: "yes" }, {})).toThrow(
      /^Invalid config: include_schemas_in_destination_stream_name: .+; update_bookmark_period: .+$/
    );
  });
});

describe("parseCatalog", () => {
  it("fills in empty schema and metadata", () => {
    expect(parseCatalog({ streams: [{ tap_stream_id: "shop-orders", stream: "orders" }] })).toEqual({
      streams: [{ tap_stream_id: "shop-orders", stream: "orders", schema: {}, metadata: [] }],
    });
  });

  it("rejects streams without an id", () => {
    expect(() => parseCatalog({ streams: [{ stream: "orders" }] })).toThrow("Invalid catalog: streams.0.tap_stream_id: Required");
  });
});

describe("parseState", () => {
  it("accepts an empty state", () => {
    expect(parseState({})).toEqual({ bookmarks: {} });
    expect(parseState(null)).toEqual({ bookmarks: {} });
  });

  it("keeps bookmarks and drops unknown keys", () => {
    expect(
      parseState({
        bookmarks: { a: { version: 3, replication_key_value: "x", replication_key_type: "string", extra: 1 } },
        currently_syncing: "a",
      })
    ).toEqual({
      bookmarks: { a: { version: 3, replication_key_value: "x", replication_key_type: "string" } },
      currently_syncing: "a",
    });
  });

  it("leaves unknown key types for the query builder to reject", () => {
    expect(parseState({ bookmarks: { a: { replication_key_value: "x", replication_key_type: "mystery" } } })).toEqual({
      bookmarks: { a: { replication_key_value: "x", replication_key_type: "mystery" } },
    });
  });

  it("rejects non-numeric versions", () => {
    expect(() => parseState({ bookmarks: { a: { version: "3" } } })).toThrow(ConfigurationError);
  });
});

describe("file loading", () => {
  const dir = mkdtempSync(path.join(tmpdir(), "tidemark-config-"));
  const write = (name: string, content: string) => {
    const file = path.join(dir, name);
    writeFileSync(file, content);
    return file;
  };

  it("reads config, catalog and state files", () => {
    expect(loadConfig(write("config.json", '{"connection_uri":"mongodb://h"}'), {}).connection_uri).toBe("mongodb://h");
    expect(loadCatalog(write("catalog.json", '{"streams":[]}'))).toEqual({ streams: [] });
    expect(loadState(write("state.json", "{}"))).toEqual({ bookmarks: {} });
  });

  it("reports unreadable and malformed files", () => {
    expect(() => loadState(path.join(dir, "nope.json"))).toThrow(/^Cannot read state file /);
    expect(() => loadState(write("bad.json", "{"))).toThrow(/^state file .+ is not valid JSON/);
  });
});
