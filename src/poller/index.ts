import { StreamCatalog } from "./catalog/streamCatalog.js";
import type { PollerConfig } from "./config/loader.js";
import { RecordEmitter, createEmitStrategy } from "./emitter/index.js";
import type { EmitStrategy } from "./emitter/recordEmitter.js";
import { EventFetcher } from "./fetcher/eventFetcher.js";
import { CloudWatchLogStore, createCloudWatchLogsApi } from "./remote/cloudwatch.js";
import type { LogStoreReader } from "./remote/types.js";
import { PollScheduler, type CycleReport } from "./runtime/scheduler.js";
import { Ticker, type Clock, type Sleep } from "./runtime/ticker.js";
import type { EventSink } from "./sink/types.js";
import { CursorFileStore, type CursorStore } from "../shared/persistence/CursorFileStore.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 起始时间下界 = now - days，截断到整秒后以毫秒表示。只在启动时计算一次。
 */
export function computeHorizon(startDaysAgo: number | undefined, nowMs: number): number | undefined {
  if (startDaysAgo === undefined) {
    return undefined;
  }
  return Math.floor((nowMs - startDaysAgo * DAY_MS) / 1000) * 1000;
}

export interface PollerDependencies {
  readonly sink: EventSink;
  /** 缺省时按配置创建 CloudWatch Logs 客户端 */
  readonly reader?: LogStoreReader;
  readonly cursors?: CursorStore;
  readonly strategy?: EmitStrategy;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  /** 墙钟，用于计算起始时间下界 */
  readonly now?: () => number;
  readonly onCycleComplete?: (report: CycleReport) => void;
}

export interface Poller {
  readonly scheduler: PollScheduler;
  readonly catalog: StreamCatalog;
  readonly cursors: CursorStore;
  readonly horizon: number | undefined;
}

export function createPoller(config: PollerConfig, deps: PollerDependencies): Poller {
  const reader = deps.reader ?? new CloudWatchLogStore(createCloudWatchLogsApi(config.transport));
  const cursors = deps.cursors ?? new CursorFileStore({ basePath: config.stateFile });
  const horizon = computeHorizon(config.startDaysAgo, (deps.now ?? Date.now)());

  const catalog = new StreamCatalog({
    reader,
    logGroupName: config.logGroupName,
    selection: config.selection,
    ...(horizon !== undefined ? { horizon } : {})
  });
  const emitter = new RecordEmitter({
    tag: config.tag,
    sink: deps.sink,
    strategy: deps.strategy ?? createEmitStrategy(config.format)
  });
  const ticker = new Ticker({
    intervalMs: config.fetchIntervalMs,
    ...(deps.clock ? { clock: deps.clock } : {}),
    ...(deps.sleep ? { sleep: deps.sleep } : {})
  });

  const scheduler = new PollScheduler({
    logGroupName: config.logGroupName,
    catalog,
    fetcher: new EventFetcher(reader),
    emitter,
    cursors,
    ticker,
    ...(horizon !== undefined ? { horizon } : {}),
    ...(deps.onCycleComplete ? { onCycleComplete: deps.onCycleComplete } : {})
  });

  return { scheduler, catalog, cursors, horizon };
}

export { StreamCatalog, filterByRecency } from "./catalog/streamCatalog.js";
export type { StreamSelection } from "./catalog/streamCatalog.js";
export { EventFetcher, resolvePosition } from "./fetcher/eventFetcher.js";
export type { FetchRequest, FetchedPage } from "./fetcher/eventFetcher.js";
export { PollScheduler } from "./runtime/scheduler.js";
export type { CycleReport, SchedulerState, StreamOutcome } from "./runtime/scheduler.js";
export { Ticker, abortableSleep, monotonicClock } from "./runtime/ticker.js";
export type { Clock, Sleep } from "./runtime/ticker.js";
export { loadPollerConfig, parsePollerConfig, resolveConfigPath } from "./config/loader.js";
export type { PollerConfig, ParserConfig } from "./config/loader.js";
export { JsonLinesSink } from "./sink/jsonLinesSink.js";
export type { EventSink, FieldMap } from "./sink/types.js";
export * from "./errors.js";
