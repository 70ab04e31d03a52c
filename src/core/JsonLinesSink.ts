import { once } from "node:events";
import type { Writable } from "node:stream";
import type { Message, Sink } from "./types.js";

/** Writes each message as one line of JSON, honouring back-pressure. */
export class JsonLinesSink implements Sink {
  constructor(private out: Writable = process.stdout) {}

  async write(message: Message): Promise<void> {
    if (!this.out.write(`${JSON.stringify(message)}\n`)) {
      await once(this.out, "drain");
    }
  }
}
