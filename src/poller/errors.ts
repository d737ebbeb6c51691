export type PollerErrorCode =
  | "configuration_missing"
  | "configuration_invalid"
  | "remote_failed"
  | "read_failed"
  | "write_failed"
  | "cursor_corrupt"
  | "parse_failed";

export class PollerError extends Error {
  constructor(
    message: string,
    public readonly code: PollerErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "PollerError";
  }
}

/**
 * 启动阶段的配置错误，进程不会进入轮询循环。
 */
export class ConfigurationError extends PollerError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    code: "configuration_missing" | "configuration_invalid" = "configuration_invalid",
    cause?: unknown
  ) {
    super(message, code, cause);
    this.name = "ConfigurationError";
  }
}

/**
 * 远端日志存储调用失败（网络、超时、限流）。只中止当前流本周期的处理。
 */
export class TransientRemoteError extends PollerError {
  constructor(
    message: string,
    public readonly operation: "getEvents" | "describeStreams",
    public readonly details: { readonly errorName?: string; readonly statusCode?: number } = {},
    cause?: unknown
  ) {
    super(message, "remote_failed", cause);
    this.name = "TransientRemoteError";
  }
}

export class PersistenceError extends PollerError {
  constructor(
    message: string,
    code: "read_failed" | "write_failed" | "cursor_corrupt",
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, code, cause);
    this.name = "PersistenceError";
  }
}

/**
 * 单条事件消息体无法解析；该事件被丢弃，同页其余事件照常处理。
 */
export class ParseError extends PollerError {
  constructor(message: string, cause?: unknown) {
    super(message, "parse_failed", cause);
    this.name = "ParseError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
