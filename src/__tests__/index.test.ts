import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { MemorySource, incrementalStream } from "../core/__tests__/fakes.js";
import { JsonLinesSink, emptyState, runSync } from "../index.js";
import { silentLogger } from "../log.js";

describe("sync to JSON lines", () => {
  it("writes a resumable message stream", async () => {
    const out = new PassThrough();
    const chunks: string[] = [];
    out.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));
    const at = new Date("2026-01-01T00:00:00.000Z");
    const clock = () => new Date("2026-02-01T00:00:00.000Z");

    await runSync({
      source: new MemorySource([{ _id: "x", updated_at: at }]),
      sink: new JsonLinesSink(out),
      catalog: { streams: [incrementalStream({ tap_stream_id: "a", stream: "a" })] },
      state: emptyState(),
      logger: silentLogger,
      clock,
    });
    await new Promise((resolve) => setImmediate(resolve));

    const lines = chunks.join("").trimEnd().split("\n").map((line): unknown => JSON.parse(line));
    const version = clock().getTime();
    expect(lines).toHaveLength(7);
    expect(lines[3]).toEqual({
      type: "SCHEMA",
      stream: "a",
      schema: {
        type: "object",
        properties: {
          _id: { type: ["null", "string"] },
          updated_at: { type: ["null", "string"], format: "date-time" },
        },
      },
      key_properties: ["_id"],
    });
    expect(lines[4]).toEqual({
      type: "RECORD",
      stream: "a",
      record: { _id: "x", updated_at: "2026-01-01T00:00:00.000Z" },
      version,
      time_extracted: "2026-02-01T00:00:00.000Z",
    });
    expect(lines[6]).toEqual({
      type: "STATE",
      value: {
        bookmarks: {
          a: { version, replication_key_value: "2026-01-01T00:00:00.000Z", replication_key_type: "datetime" },
        },
        currently_syncing: null,
      },
    });
  });
});
