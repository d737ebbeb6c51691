import { NoneParser, RegexpParser } from "./parsers.js";
import type { EmitStrategy } from "./recordEmitter.js";
import type { ParserConfig } from "../config/loader.js";

/**
 * 根据 format 配置选择解析策略；未配置或 type 为 json 时走内置的结构化解析。
 */
export function createEmitStrategy(format: ParserConfig | undefined): EmitStrategy {
  if (!format || format.type === "json") {
    return { kind: "structured" };
  }
  if (format.type === "none") {
    return { kind: "text", parser: new NoneParser(format.messageKey) };
  }
  return {
    kind: "text",
    parser: new RegexpParser({
      expression: format.expression,
      ...(format.timeKey ? { timeKey: format.timeKey } : {}),
      ...(format.keepTimeKey !== undefined ? { keepTimeKey: format.keepTimeKey } : {})
    })
  };
}

export { RecordEmitter, STREAM_FIELD, parseStructuredBody } from "./recordEmitter.js";
export type { EmitStrategy, RecordEmitterOptions } from "./recordEmitter.js";
export { NoneParser, RegexpParser, toEpochSeconds } from "./parsers.js";
export type { ParseContext, ParsedRecord, TextParser } from "./parsers.js";
