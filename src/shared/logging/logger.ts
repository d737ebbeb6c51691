import { join } from "node:path";

import pino, { type DestinationStream, type Logger } from "pino";

import type { LogEventLevel, LogEventPublisher } from "./events.js";
import { getLogpullLogsDirectory } from "../environment/pathResolver.js";

const LOG_FILE = "poller.jsonl";

/**
 * LOGPULL_LOG_FILE=- 时日志写入 stderr，stdout 留给输出的事件记录。
 */
function createDestination(): DestinationStream {
  const override = process.env.LOGPULL_LOG_FILE?.trim();
  if (override === "-") {
    return pino.destination({ dest: 2, sync: false });
  }
  return pino.destination({
    dest: override && override.length > 0 ? override : join(getLogpullLogsDirectory(), LOG_FILE),
    mkdir: true,
    sync: false
  });
}

const rootLogger: Logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid }
  },
  createDestination()
);

let publisher: LogEventPublisher | null = null;

/**
 * 注册进程级的日志观察者（嵌入方或测试用）；传 null 取消。
 */
export function setLogEventPublisher(next: LogEventPublisher | null): void {
  publisher = next;
}

export interface LoggerFacade {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

/**
 * 每个组件一个 child logger，category 与固定上下文写入每一行。
 */
export function createLoggerFacade(category: string, context: Record<string, unknown> = {}): LoggerFacade {
  const child = rootLogger.child({ category, ...context });

  const write = (level: LogEventLevel, message: string, extra: Record<string, unknown>) => {
    child[level](extra, message);
    publisher?.({ category, level, message, context: { ...context, ...extra } });
  };

  return {
    info: (message, extra = {}) => write("info", message, extra),
    warn: (message, extra = {}) => write("warn", message, extra),
    error: (message, error, extra = {}) =>
      write("error", message, error === undefined ? extra : { ...extra, error: serializeError(error) })
  };
}
