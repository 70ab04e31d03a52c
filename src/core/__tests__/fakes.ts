import { ObjectId } from "mongodb";
import type { CatalogStream, Message, Query, Row, Sink, Source, SourceCursor } from "../types.js";

function comparable(value: unknown): number | string {
  if (value instanceof Date) return value.getTime();
  if (value instanceof ObjectId) return value.toHexString();
  if (typeof value === "number" || typeof value === "string") return value;
  return String(value);
}

function compare(a: unknown, b: unknown): number {
  const x = comparable(a);
  const y = comparable(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Applies `{ key: { $gte } }` filters and single-key ascending sorts to an array of rows. */
export class MemorySource implements Source {
  queries: Query[] = [];
  closes = 0;

  constructor(
    private rows: Row[],
    private options: { failAfter?: number; failClose?: boolean } = {}
  ) {}

  find(_stream: CatalogStream, query: Query): SourceCursor {
    this.queries.push(query);
    const rows = this.select(query);
    const { failAfter, failClose } = this.options;
    return {
      async *[Symbol.asyncIterator]() {
        let yielded = 0;
        for (const row of rows) {
          if (yielded === failAfter) throw new Error("connection reset");
          yielded += 1;
          yield row;
        }
        if (yielded === failAfter) throw new Error("connection reset");
      },
      close: async () => {
        this.closes += 1;
        if (failClose) throw new Error("socket closed");
      },
    };
  }

  private select(query: Query): Row[] {
    let rows = this.rows.filter((row) =>
      Object.entries(query.filter).every(([key, cond]) => {
        const bound: unknown = Reflect.get(cond, "$gte");
        return compare(row[key], bound) >= 0;
      })
    );
    const [sortKey] = Object.keys(query.sort);
    if (sortKey !== undefined) {
      rows = [...rows].sort((a, b) => compare(a[sortKey], b[sortKey]));
    }
    return rows;
  }
}

export class MemorySink implements Sink {
  messages: Message[] = [];
  private records = 0;

  constructor(private options: { failOnRecord?: number } = {}) {}

  async write(message: Message): Promise<void> {
    if (message.type === "RECORD") {
      this.records += 1;
      if (this.records === this.options.failOnRecord) {
        throw new Error("disk full");
      }
    }
    this.messages.push(message);
  }

  types(): string[] {
    return this.messages.map((m) => m.type);
  }
}

export function incrementalStream(
  overrides: Partial<CatalogStream> = {},
  metadata: Record<string, unknown> = {}
): CatalogStream {
  return {
    tap_stream_id: "shop-orders",
    stream: "orders",
    schema: {},
    metadata: [
      {
        breadcrumb: [],
        metadata: {
          selected: true,
          "replication-method": "INCREMENTAL",
          "replication-key": "updated_at",
          "database-name": "shop",
          ...metadata,
        },
      },
    ],
    ...overrides,
  };
}
