import type { StreamCatalog } from "../catalog/streamCatalog.js";
import type { RecordEmitter } from "../emitter/recordEmitter.js";
import { PersistenceError, TransientRemoteError } from "../errors.js";
import type { EventFetcher } from "../fetcher/eventFetcher.js";
import type { Ticker } from "./ticker.js";
import type { CursorStore } from "../../shared/persistence/CursorFileStore.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";

export type SchedulerState = "idle" | "resolving" | "fetching" | "stopping" | "stopped";

/**
 * 调度上下文，只由调度循环自身修改。
 */
interface SchedulerContext {
  state: SchedulerState;
  cycle: number;
  currentStream: string | null;
  /** 启动时计算一次的起始时间下界（epoch 毫秒） */
  readonly horizon: number | undefined;
}

export type StreamOutcome =
  | { readonly stream: string; readonly status: "ok"; readonly fetched: number; readonly emitted: number; readonly cursor: string }
  | { readonly stream: string; readonly status: "failed"; readonly error: Error };

export interface CycleReport {
  readonly cycle: number;
  readonly streams: readonly StreamOutcome[];
  readonly resolveError?: Error;
  /** 收到停止请求后未处理的流 */
  readonly skipped: readonly string[];
}

export interface PollSchedulerOptions {
  readonly logGroupName: string;
  readonly catalog: StreamCatalog;
  readonly fetcher: EventFetcher;
  readonly emitter: RecordEmitter;
  readonly cursors: CursorStore;
  readonly ticker: Ticker;
  readonly horizon?: number;
  readonly onCycleComplete?: (report: CycleReport) => void;
}

/**
 * 轮询调度器
 *
 * 单一控制循环：Idle → Resolving → Fetching → Idle。流在周期内顺序处理，
 * 同一时刻最多一个远端调用在途，游标只有这一个写者。
 * 停止请求只在两个「拉取-发出-保存」单元之间生效，不会打断进行中的单元。
 */
export class PollScheduler {
  private readonly options: PollSchedulerOptions;
  private readonly logger: LoggerFacade;
  private readonly context: SchedulerContext;
  private readonly abort = new AbortController();
  private running: Promise<void> | null = null;

  constructor(options: PollSchedulerOptions) {
    this.options = options;
    this.logger = createLoggerFacade("poll-scheduler", { logGroup: options.logGroupName });
    this.context = {
      state: "idle",
      cycle: 0,
      currentStream: null,
      horizon: options.horizon
    };
  }

  getState(): SchedulerState {
    return this.context.state;
  }

  /**
   * 启动循环，直到 stop() 被调用。重复调用返回同一个 Promise。
   */
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /**
   * 请求停止并等待当前单元完成。
   */
  async stop(): Promise<void> {
    if (this.context.state !== "stopped") {
      this.context.state = "stopping";
    }
    this.abort.abort();
    if (this.running) {
      await this.running;
    } else {
      this.context.state = "stopped";
    }
  }

  private get stopRequested(): boolean {
    return this.abort.signal.aborted;
  }

  private async loop(): Promise<void> {
    this.logger.info("Poll loop started", { horizon: this.context.horizon ?? null });
    try {
      while (await this.options.ticker.next(this.abort.signal)) {
        const report = await this.runCycle();
        this.options.onCycleComplete?.(report);
      }
    } finally {
      this.context.state = "stopped";
      this.logger.info("Poll loop stopped", { cycles: this.context.cycle });
    }
  }

  /**
   * 执行一个完整周期。单个流的失败只影响它自己，不会中断其他流。
   */
  async runCycle(): Promise<CycleReport> {
    const cycle = ++this.context.cycle;
    this.setState("resolving");

    let streams: string[];
    try {
      streams = await this.options.catalog.resolve();
    } catch (error) {
      const resolveError = toError(error);
      this.logger.warn("Stream resolution failed; retrying next cycle", { cycle, error: resolveError.message });
      this.setState("idle");
      return { cycle, streams: [], resolveError, skipped: [] };
    }

    this.setState("fetching");
    const outcomes: StreamOutcome[] = [];
    const skipped: string[] = [];
    for (const stream of streams) {
      if (this.stopRequested) {
        skipped.push(stream);
        continue;
      }
      outcomes.push(await this.pollStream(stream));
    }

    this.context.currentStream = null;
    this.setState("idle");
    if (skipped.length > 0) {
      this.logger.info("Stop requested; remaining streams deferred", { cycle, skipped: skipped.length });
    }
    return { cycle, streams: outcomes, skipped };
  }

  private async pollStream(stream: string): Promise<StreamOutcome> {
    const { cursors, fetcher, emitter, logGroupName } = this.options;
    this.context.currentStream = stream;

    try {
      const cursor = await cursors.load(stream);
      const page = await fetcher.fetch({
        logGroupName,
        logStreamName: stream,
        cursor,
        ...(this.context.horizon !== undefined ? { startTime: this.context.horizon } : {})
      });

      let emitted = 0;
      for (const event of page.events) {
        emitted += emitter.emit(event, stream);
      }

      // 先发出再保存：崩溃时最多重复投递，不会丢失
      await cursors.save(stream, page.nextCursor);
      return { stream, status: "ok", fetched: page.events.length, emitted, cursor: page.nextCursor };
    } catch (error) {
      const failure = toError(error);
      if (failure instanceof TransientRemoteError) {
        this.logger.warn("Remote fetch failed; stream will retry next cycle", {
          logStream: stream,
          error: failure.message,
          ...failure.details
        });
      } else if (failure instanceof PersistenceError) {
        this.logger.error("Cursor persistence failed; stream keeps its last saved cursor", failure, {
          logStream: stream,
          code: failure.code,
          filePath: failure.filePath
        });
      } else {
        this.logger.error("Stream poll failed", failure, { logStream: stream });
      }
      return { stream, status: "failed", error: failure };
    }
  }

  private setState(state: SchedulerState): void {
    // stopping 只能转到 stopped
    if (this.context.state === "stopping" || this.context.state === "stopped") {
      return;
    }
    this.context.state = state;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
