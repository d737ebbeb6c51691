import process from "node:process";

import { createPoller, describeError, parsePollerConfig, setLogEventPublisher } from "../src/index.js";
import type { EventSink } from "../src/index.js";

/**
 * 嵌入用法：不经 CLI，直接以对象构建配置并用自定义 sink 输出。
 *
 *   node --import tsx examples/tail-group.ts /ecs/checkout web- 1
 */
const [logGroupName, prefix, days] = process.argv.slice(2);
if (!logGroupName || !prefix) {
  process.stderr.write("usage: tail-group.ts <logGroupName> <streamPrefix> [startDaysAgo]\n");
  process.exit(2);
}

const config = parsePollerConfig({
  tag: "example.tail",
  logGroupName,
  logStreamName: prefix,
  useLogStreamNamePrefix: true,
  stateFile: "examples/tail-group",
  fetchInterval: "15s",
  ...(days ? { startDaysAgo: Number.parseInt(days, 10) } : {}),
  format: { type: "none" }
});

const sink: EventSink = {
  emit(_tag, time, record) {
    const at = new Date(time * 1000).toISOString();
    process.stdout.write(`${at} [${String(record._stream)}] ${String(record.message)}\n`);
  }
};

// 轮询器自身的告警同时打印到终端
setLogEventPublisher(({ level, category, message }) => {
  if (level !== "info") {
    process.stderr.write(`[${level}] ${category}: ${message}\n`);
  }
});

const { scheduler } = createPoller(config, {
  sink,
  onCycleComplete: (report) => {
    for (const outcome of report.streams) {
      if (outcome.status === "failed") {
        process.stderr.write(`${outcome.stream}: ${describeError(outcome.error)}\n`);
      }
    }
  }
});

process.once("SIGINT", () => {
  scheduler.stop().catch((error: unknown) => {
    process.stderr.write(`stop failed: ${describeError(error)}\n`);
  });
});

scheduler.start().catch((error: unknown) => {
  process.stderr.write(`poller crashed: ${describeError(error)}\n`);
  process.exitCode = 1;
});
