import { describe, expect, it } from "vitest";
import {
  databaseName,
  destinationStreamName,
  isSelected,
  projection,
  replicationKey,
  replicationMethod,
  streamMetadata,
} from "../catalog.js";
import { ConfigurationError } from "../core/errors.js";
import { incrementalStream } from "../core/__tests__/fakes.js";

describe("catalog metadata", () => {
  it("reads stream-level metadata and ignores field breadcrumbs", () => {
    const stream = incrementalStream();
    stream.metadata.push({ breadcrumb: ["properties", "total"], metadata: { "replication-key": "total" } });

    expect(streamMetadata(stream)["replication-key"]).toBe("updated_at");
    expect(replicationKey(stream)).toBe("updated_at");
    expect(replicationMethod(stream)).toBe("INCREMENTAL");
    expect(databaseName(stream)).toBe("shop");
    expect(isSelected(stream)).toBe(true);
  });

  it("requires a replication key", () => {
    const stream = incrementalStream({}, { "replication-key": "" });
    expect(() => replicationKey(stream)).toThrow(new ConfigurationError("No replication key defined for stream shop-orders"));
  });

  it("treats a missing selected flag as unselected", () => {
    expect(isSelected(incrementalStream({}, { selected: undefined }))).toBe(false);
  });

  it("qualifies the destination name with the database on request", () => {
    const stream = incrementalStream();
    expect(destinationStreamName(stream)).toBe("orders");
    expect(destinationStreamName(stream, true)).toBe("shop-orders");
    expect(destinationStreamName(incrementalStream({}, { "database-name": undefined }), true)).toBe("orders");
  });
});

describe("projection", () => {
  it("accepts objects and JSON strings", () => {
    expect(projection(incrementalStream())).toBeUndefined();
    expect(projection(incrementalStream({}, { projection: { a: 1 } }))).toEqual({ a: 1 });
    expect(projection(incrementalStream({}, { projection: '{"a": 1, "b": 0}' }))).toEqual({ a: 1, b: 0 });
  });

  it("rejects invalid projections", () => {
    expect(() => projection(incrementalStream({}, { projection: "{a:" }))).toThrow(
      "The projection provided for shop-orders is not valid JSON: {a:"
    );
    expect(() => projection(incrementalStream({}, { projection: "[1]" }))).toThrow(ConfigurationError);
  });
});
