import type { Command } from "@oclif/core";

import { ConfigurationError } from "../../poller/errors.js";
import { loadPollerConfig, type PollerConfig } from "../../poller/config/loader.js";
import type { CycleReport, PollScheduler } from "../../poller/runtime/scheduler.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";

/**
 * 加载配置；配置错误时逐条输出问题并以状态码 1 退出，不进入轮询循环。
 */
export async function loadConfigOrExit(command: Command, configPath: string | undefined): Promise<PollerConfig> {
  try {
    return await loadPollerConfig(configPath ? { filePath: configPath } : {});
  } catch (error) {
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) {
        command.logToStderr(`  ${issue}`);
      }
      command.error(error.message, { exit: 1 });
    }
    throw error;
  }
}

export function summarizeCycle(report: CycleReport): string {
  if (report.resolveError) {
    return `cycle ${report.cycle}: stream resolution failed: ${report.resolveError.message}`;
  }
  const parts = report.streams.map((outcome) =>
    outcome.status === "ok"
      ? `${outcome.stream} ok (${outcome.emitted}/${outcome.fetched} emitted)`
      : `${outcome.stream} failed (${outcome.error.message})`
  );
  if (report.skipped.length > 0) {
    parts.push(`${report.skipped.length} skipped`);
  }
  return `cycle ${report.cycle}: ${parts.length > 0 ? parts.join(", ") : "no streams"}`;
}

/**
 * SIGINT/SIGTERM 处理：请求停止并等待当前流单元完成。停止过程中循环抛出的错误写入日志。
 */
export function createShutdownHandler(
  scheduler: Pick<PollScheduler, "stop">,
  report: (line: string) => void,
  logger: LoggerFacade = createLoggerFacade("cli")
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    report(`received ${signal}, finishing current stream`);
    scheduler.stop().catch((error: unknown) => {
      logger.error("Poll loop failed while stopping", error, { signal });
    });
  };
}
