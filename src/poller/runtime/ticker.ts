import { performance } from "node:perf_hooks";

export interface Clock {
  now(): number;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const monotonicClock: Clock = {
  now: () => performance.now()
};

/**
 * 可被 signal 提前唤醒的 sleep；唤醒时正常 resolve，不抛错。
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export interface TickerOptions {
  readonly intervalMs: number;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
}

/**
 * 固定间隔节拍器
 *
 * 下一次触发时间按 interval 累加，而不是从上次完成时刻重新计算：
 * 某个周期超时后，落后的节拍会立即补发，既不跳过也不合并。
 */
export class Ticker {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private nextTickAt: number | null = null;

  constructor(options: TickerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Ticker interval must be a positive number, got ${options.intervalMs}`);
    }
    this.intervalMs = options.intervalMs;
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * 等待下一个节拍。首次调用立即触发。
   * @returns 触发时为 true；signal 中止时为 false
   */
  async next(signal: AbortSignal): Promise<boolean> {
    if (this.nextTickAt === null) {
      this.nextTickAt = this.clock.now();
    }

    while (!signal.aborted) {
      const remaining = this.nextTickAt - this.clock.now();
      if (remaining <= 0) {
        this.nextTickAt += this.intervalMs;
        return true;
      }
      await this.sleep(remaining, signal);
    }
    return false;
  }

  /** 下一次触发的时刻（时钟单位），尚未开始时为 null */
  peekNextTickAt(): number | null {
    return this.nextTickAt;
  }
}
