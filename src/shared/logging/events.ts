export type LogEventLevel = "info" | "warn" | "error";

/**
 * 每条日志在写入 pino 之后同步转交给发布者的副本。
 */
export interface LogsAppendedPayload {
  /** 组件类别，例如 cursor-store、poll-scheduler */
  readonly category: string;
  readonly level: LogEventLevel;
  readonly message: string;
  readonly context: Record<string, unknown>;
}

export type LogEventPublisher = (payload: LogsAppendedPayload) => void;
