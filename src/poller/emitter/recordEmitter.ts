import { ParseError, describeError } from "../errors.js";
import type { RemoteLogEvent } from "../remote/types.js";
import type { EventSink, FieldMap } from "../sink/types.js";
import { toEpochSeconds, type ParsedRecord, type TextParser } from "./parsers.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";

/** 记录来源流名所在的保留字段 */
export const STREAM_FIELD = "_stream";

/**
 * 解析策略：未注入文本解析器时，消息体按自描述的结构化（JSON）记录处理。
 */
export type EmitStrategy =
  | { readonly kind: "structured" }
  | { readonly kind: "text"; readonly parser: TextParser };

export interface RecordEmitterOptions {
  readonly tag: string;
  readonly sink: EventSink;
  readonly strategy?: EmitStrategy;
}

export function parseStructuredBody(event: RemoteLogEvent): ParsedRecord[] {
  let payload: unknown;
  try {
    payload = JSON.parse(event.message);
  } catch (error) {
    throw new ParseError(`Message body is not valid JSON: ${describeError(error)}`, error);
  }
  if (!isFieldMap(payload)) {
    throw new ParseError("Message body is not a JSON object");
  }
  return [{ time: toEpochSeconds(event.timestamp), record: payload }];
}

function isFieldMap(value: unknown): value is FieldMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class RecordEmitter {
  private readonly tag: string;
  private readonly sink: EventSink;
  private readonly strategy: EmitStrategy;
  private readonly logger: LoggerFacade;

  constructor(options: RecordEmitterOptions) {
    this.tag = options.tag;
    this.sink = options.sink;
    this.strategy = options.strategy ?? { kind: "structured" };
    this.logger = createLoggerFacade("record-emitter", { tag: options.tag });
  }

  /**
   * 把一条远端事件转为结构化记录交给下游，返回实际发出的记录数。
   * 无法解析的事件被丢弃（返回 0），不影响同页其余事件。
   * streamName 为 undefined 时不注入来源字段。
   */
  emit(event: RemoteLogEvent, streamName?: string): number {
    let parsed: ParsedRecord[];
    try {
      parsed = this.parse(event);
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.warn("Dropping unparseable log event", {
          logStream: streamName,
          timestamp: event.timestamp,
          error: error.message
        });
        return 0;
      }
      throw error;
    }

    for (const { time, record } of parsed) {
      const fields: FieldMap = streamName === undefined ? { ...record } : { ...record, [STREAM_FIELD]: streamName };
      this.sink.emit(this.tag, time, fields);
    }
    return parsed.length;
  }

  private parse(event: RemoteLogEvent): ParsedRecord[] {
    switch (this.strategy.kind) {
      case "structured":
        return parseStructuredBody(event);
      case "text":
        return this.strategy.parser.parse(event.message, { timestamp: event.timestamp });
    }
  }
}
