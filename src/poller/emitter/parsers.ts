import { ConfigurationError, ParseError, describeError } from "../errors.js";
import type { FieldMap } from "../sink/types.js";

export interface ParsedRecord {
  /** 事件时间，epoch 秒 */
  readonly time: number;
  readonly record: FieldMap;
}

export interface ParseContext {
  /** 远端事件时间，epoch 毫秒 */
  readonly timestamp: number;
}

/**
 * 可插拔的文本解析器：一条消息体解析为零到多条 (时间, 字段)。
 */
export interface TextParser {
  parse(message: string, context: ParseContext): ParsedRecord[];
}

export function toEpochSeconds(milliseconds: number): number {
  return Math.floor(milliseconds / 1000);
}

const NAMED_CAPTURE_GROUP = /\(\?<[A-Za-z_$][\w$]*>/;

/**
 * 校验 regexp 表达式：能编译，且至少有一个命名捕获组。返回问题描述，可用时为 null。
 */
export function findExpressionProblem(expression: string): string | null {
  try {
    new RegExp(expression);
  } catch (error) {
    return `is not a valid regular expression: ${describeError(error)}`;
  }
  if (!NAMED_CAPTURE_GROUP.test(expression)) {
    return "must declare at least one named capture group";
  }
  return null;
}

export interface RegexpParserOptions {
  readonly expression: string;
  readonly timeKey?: string;
  readonly keepTimeKey?: boolean;
}

/**
 * 命名捕获组即字段名。未匹配的消息不产生记录。
 */
export class RegexpParser implements TextParser {
  private readonly pattern: RegExp;
  private readonly timeKey: string | undefined;
  private readonly keepTimeKey: boolean;

  constructor(options: RegexpParserOptions) {
    const problem = findExpressionProblem(options.expression);
    if (problem !== null) {
      throw new ConfigurationError(`format.expression ${problem}`, [`format.expression: ${problem}`]);
    }
    this.pattern = new RegExp(options.expression);
    this.timeKey = options.timeKey;
    this.keepTimeKey = options.keepTimeKey ?? false;
  }

  parse(message: string, context: ParseContext): ParsedRecord[] {
    const match = this.pattern.exec(message);
    if (!match?.groups) {
      return [];
    }

    const record: FieldMap = {};
    for (const [key, value] of Object.entries(match.groups)) {
      if (value !== undefined) {
        record[key] = value;
      }
    }

    let time = toEpochSeconds(context.timestamp);
    if (this.timeKey !== undefined) {
      const raw = record[this.timeKey];
      if (typeof raw !== "string") {
        throw new ParseError(`Time field '${this.timeKey}' was not captured`);
      }
      const parsed = Date.parse(raw);
      if (Number.isNaN(parsed)) {
        throw new ParseError(`Time field '${this.timeKey}' has unparseable value '${raw}'`);
      }
      time = toEpochSeconds(parsed);
      if (!this.keepTimeKey) {
        delete record[this.timeKey];
      }
    }

    return [{ time, record }];
  }
}

/**
 * 不解析，整条消息放入单个字段。
 */
export class NoneParser implements TextParser {
  constructor(private readonly messageKey = "message") {}

  parse(message: string, context: ParseContext): ParsedRecord[] {
    return [{ time: toEpochSeconds(context.timestamp), record: { [this.messageKey]: message } }];
  }
}
