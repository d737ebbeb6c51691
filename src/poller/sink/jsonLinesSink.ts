import type { Writable } from "node:stream";

import type { EventSink, FieldMap } from "./types.js";

/**
 * 每条记录一行 JSON：{"tag":…,"time":…,"record":{…}}
 */
export class JsonLinesSink implements EventSink {
  constructor(private readonly output: Writable) {}

  emit(tag: string, time: number, record: FieldMap): void {
    this.output.write(`${JSON.stringify({ tag, time, record })}\n`);
  }
}
