import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parsePollerConfig } from "../../../src/poller/config/loader.js";
import { PersistenceError, TransientRemoteError } from "../../../src/poller/errors.js";
import { createPoller, type Poller, type PollerDependencies } from "../../../src/poller/index.js";
import type { CycleReport } from "../../../src/poller/runtime/scheduler.js";
import type { FieldMap } from "../../../src/poller/sink/types.js";
import { CursorFileStore, type CursorStore } from "../../../src/shared/persistence/CursorFileStore.js";
import { FakeClock } from "../../helpers/fakeClock.js";
import { FakeLogStore, describePage, page } from "../../helpers/fakeLogStore.js";

const GROUP = "/ecs/checkout";
const DAY_MS = 86_400_000;
const NOW = Date.UTC(2024, 4, 20, 12, 0, 0, 750);

type Emitted = [tag: string, time: number, record: FieldMap];

describe("PollScheduler", () => {
  let stateDir: string;
  let stateFile: string;
  let store: FakeLogStore;
  let clock: FakeClock;
  let emitted: Emitted[];

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), "logpull-scheduler-"));
    stateFile = join(stateDir, "cursor");
    store = new FakeLogStore();
    clock = new FakeClock();
    emitted = [];
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  function build(config: Record<string, unknown>, deps: Partial<PollerDependencies> = {}): Poller {
    const parsed = parsePollerConfig({
      tag: "cw.checkout",
      logGroupName: GROUP,
      logStreamName: "web",
      stateFile,
      fetchInterval: 60,
      ...config
    });
    return createPoller(parsed, {
      sink: { emit: (tag, time, record) => emitted.push([tag, time, record]) },
      reader: store,
      clock,
      sleep: clock.sleep,
      now: () => NOW,
      ...deps
    });
  }

  async function readCursor(stream: string): Promise<string> {
    return readFile(`${stateFile}_${encodeURIComponent(stream)}`, "utf-8");
  }

  describe("游标推进", () => {
    it("N 个成功周期后游标等于第 N 次响应的 nextForwardToken，空页也推进", async () => {
      store
        .queuePage("web", page("f/1/s", [1_000, '{"n":1}']))
        .queuePage("web", page("f/2/s"))
        .queuePage("web", page("f/3/s", [3_000, '{"n":3}'], [3_500, '{"n":4}']));
      const { scheduler } = build({});

      await scheduler.runCycle();
      await expect(readCursor("web")).resolves.toBe("f/1/s");
      await scheduler.runCycle();
      await expect(readCursor("web")).resolves.toBe("f/2/s");
      await scheduler.runCycle();
      await expect(readCursor("web")).resolves.toBe("f/3/s");

      expect(store.getEventsCalls.map((call) => call.position)).toEqual([
        { kind: "head" },
        { kind: "token", nextToken: "f/1/s" },
        { kind: "token", nextToken: "f/2/s" }
      ]);
      expect(emitted).toEqual([
        ["cw.checkout", 1, { n: 1, _stream: "web" }],
        ["cw.checkout", 3, { n: 3, _stream: "web" }],
        ["cw.checkout", 3, { n: 4, _stream: "web" }]
      ]);
    });

    it("同页中无法解析的事件被丢弃，其余事件照常发出且游标推进", async () => {
      store.queuePage(
        "web",
        page("f/1/s", [1_000, '{"n":1}'], [2_000, "plain text, not json"], [3_000, "[1,2]"], [4_000, '{"n":4}'])
      );
      const { scheduler } = build({});

      const report = await scheduler.runCycle();

      expect(emitted).toEqual([
        ["cw.checkout", 1, { n: 1, _stream: "web" }],
        ["cw.checkout", 4, { n: 4, _stream: "web" }]
      ]);
      expect(report.streams).toEqual([{ stream: "web", status: "ok", fetched: 4, emitted: 2, cursor: "f/1/s" }]);
      await expect(readCursor("web")).resolves.toBe("f/1/s");
    });

    it("重启后使用已保存的游标，即使配置了起始天数", async () => {
      await writeFile(`${stateFile}_web`, "f/seeded/s", "utf-8");
      store.queuePage("web", page("f/next/s"));
      const { scheduler } = build({ startDaysAgo: 3 });

      const report = await scheduler.runCycle();

      expect(store.getEventsCalls[0]?.position).toEqual({ kind: "token", nextToken: "f/seeded/s" });
      expect(report.streams).toEqual([
        { stream: "web", status: "ok", fetched: 0, emitted: 0, cursor: "f/next/s" }
      ]);
    });
  });

  describe("起始时间下界", () => {
    it("没有游标的流以 now - N 天作为起始时间，同一次运行中所有流共用该值", async () => {
      const horizon = Date.UTC(2024, 4, 18, 12, 0, 0);
      let wallClock = NOW;
      const now = vi.fn(() => {
        const value = wallClock;
        wallClock += DAY_MS;
        return value;
      });
      store.setDescribePages([
        describePage([
          { name: "web-a", lastEventTimestamp: horizon + 1 },
          { name: "web-b", lastEventTimestamp: horizon + 2 }
        ]),
        describePage([
          { name: "web-a", lastEventTimestamp: horizon + 5 },
          { name: "web-c", lastEventTimestamp: horizon + 6 }
        ])
      ]);
      store
        .queuePage("web-a", page("a/1"))
        .queuePage("web-b", page("b/1"))
        .queuePage("web-a", page("a/2"))
        .queuePage("web-c", page("c/1"));
      const poller = build({ logStreamName: "web-", useLogStreamNamePrefix: true, startDaysAgo: 2 }, { now });

      await poller.scheduler.runCycle();
      await poller.scheduler.runCycle();

      expect(poller.horizon).toBe(horizon);
      expect(now).toHaveBeenCalledTimes(1);
      expect(store.getEventsCalls.map((call) => [call.stream, call.position])).toEqual([
        ["web-a", { kind: "startTime", startTime: horizon }],
        ["web-b", { kind: "startTime", startTime: horizon }],
        ["web-a", { kind: "token", nextToken: "a/1" }],
        ["web-c", { kind: "startTime", startTime: horizon }]
      ]);
    });

    it("发现阶段排除过旧或无事件的流", async () => {
      const horizon = Date.UTC(2024, 4, 19, 12, 0, 0);
      store.setDescribePages([
        describePage([
          { name: "old", lastEventTimestamp: horizon - 1 },
          { name: "fresh", lastEventTimestamp: horizon },
          { name: "never" }
        ])
      ]);
      store.queuePage("fresh", page("fresh/1"));
      const { scheduler } = build({ logStreamName: "x", useLogStreamNamePrefix: true, startDaysAgo: 1 });

      const report = await scheduler.runCycle();

      expect(report.streams.map((outcome) => outcome.stream)).toEqual(["fresh"]);
    });
  });

  describe("按流隔离失败", () => {
    beforeEach(() => {
      store.setDescribePages([describePage([{ name: "A" }, { name: "B" }, { name: "C" }])]);
    });

    it("B 的远端错误不影响已处理的 A 和之后的 C", async () => {
      store
        .queuePage("A", page("a/1", [1_000, '{"from":"A"}']))
        .queuePage("B", new TransientRemoteError("Rate exceeded", "getEvents", { errorName: "ThrottlingException" }))
        .queuePage("C", page("c/1", [2_000, '{"from":"C"}']));
      const { scheduler, cursors } = build({ logStreamName: "x", useLogStreamNamePrefix: true });

      const report = await scheduler.runCycle();

      expect(report.streams.map((outcome) => [outcome.stream, outcome.status])).toEqual([
        ["A", "ok"],
        ["B", "failed"],
        ["C", "ok"]
      ]);
      expect(emitted.map(([, , record]) => record)).toEqual([
        { from: "A", _stream: "A" },
        { from: "C", _stream: "C" }
      ]);
      await expect(cursors.load("A")).resolves.toBe("a/1");
      await expect(cursors.load("B")).resolves.toBeNull();
      await expect(cursors.load("C")).resolves.toBe("c/1");
    });

    it("游标保存失败时保留上次的值，下个周期从该处重新拉取", async () => {
      const files = new CursorFileStore({ basePath: stateFile });
      await files.save("A", "a/0");
      let failNextSave = true;
      const flaky: CursorStore = {
        load: (key) => files.load(key),
        pathFor: (key) => files.pathFor(key),
        save: async (key, cursor) => {
          if (key === "A" && failNextSave) {
            failNextSave = false;
            throw new PersistenceError("disk full", "write_failed", files.pathFor(key));
          }
          await files.save(key, cursor);
        }
      };
      store.setDescribePages([describePage([{ name: "A" }]), describePage([{ name: "A" }])]);
      store.queuePage("A", page("a/1", [1_000, '{"try":1}'])).queuePage("A", page("a/1", [1_000, '{"try":1}']));
      const { scheduler } = build({ logStreamName: "x", useLogStreamNamePrefix: true }, { cursors: flaky });

      const first = await scheduler.runCycle();
      const second = await scheduler.runCycle();

      expect(first.streams[0]?.status).toBe("failed");
      expect(second.streams[0]?.status).toBe("ok");
      expect(store.getEventsCalls.map((call) => call.position)).toEqual([
        { kind: "token", nextToken: "a/0" },
        { kind: "token", nextToken: "a/0" }
      ]);
      // 至少一次投递：同一事件重复发出
      expect(emitted).toHaveLength(2);
      await expect(files.load("A")).resolves.toBe("a/1");
    });

    it("损坏的游标文件让该流失败，而不是退回起始时间", async () => {
      await writeFile(`${stateFile}_B`, "b/1\u0000garbage", "utf-8");
      store.setDescribePages([
        describePage([
          { name: "A", lastEventTimestamp: NOW },
          { name: "B", lastEventTimestamp: NOW },
          { name: "C", lastEventTimestamp: NOW }
        ])
      ]);
      store.queuePage("A", page("a/1")).queuePage("C", page("c/1"));
      const { scheduler } = build({ logStreamName: "x", useLogStreamNamePrefix: true, startDaysAgo: 1 });

      const report = await scheduler.runCycle();

      const failed = report.streams[1];
      expect(failed?.status === "failed" ? failed.error : null).toBeInstanceOf(PersistenceError);
      expect(store.getEventsCalls.map((call) => call.stream)).toEqual(["A", "C"]);
    });

    it("发现阶段失败时本周期不处理任何流", async () => {
      store.setDescribePages([new TransientRemoteError("network down", "describeStreams")]);
      const { scheduler } = build({ logStreamName: "x", useLogStreamNamePrefix: true });

      const report = await scheduler.runCycle();

      expect(report.resolveError?.message).toBe("network down");
      expect(report.streams).toEqual([]);
      expect(scheduler.getState()).toBe("idle");
    });
  });

  describe("调度循环", () => {
    it("按固定间隔触发，stop 后退出", async () => {
      for (let i = 1; i <= 3; i++) {
        store.queuePage("web", page(`f/${i}/s`));
      }
      const cycleTimes: number[] = [];
      const poller: Poller = build(
        {},
        {
          onCycleComplete: (report: CycleReport) => {
            cycleTimes.push(clock.now());
            if (report.cycle === 3) {
              void poller.scheduler.stop();
            }
          }
        }
      );

      await poller.scheduler.start();

      expect(cycleTimes).toEqual([0, 60_000, 120_000]);
      expect(clock.sleeps).toEqual([60_000, 60_000]);
      expect(poller.scheduler.getState()).toBe("stopped");
      await expect(readCursor("web")).resolves.toBe("f/3/s");
    });

    it("周期耗时超过间隔时立即补发，不跳过也不合并", async () => {
      for (let i = 1; i <= 3; i++) {
        store.queuePage("web", page(`f/${i}/s`));
      }
      store.beforeGetEvents = () => clock.advance(150_000);
      const startTimes: number[] = [];
      const poller: Poller = build(
        {},
        {
          onCycleComplete: (report: CycleReport) => {
            startTimes.push(clock.now() - 150_000);
            if (report.cycle === 3) {
              void poller.scheduler.stop();
            }
          }
        }
      );

      await poller.scheduler.start();

      expect(startTimes).toEqual([0, 150_000, 300_000]);
      expect(clock.sleeps).toEqual([]);
    });

    it("停止请求在当前流单元完成后生效，剩余流推迟", async () => {
      store.setDescribePages([describePage([{ name: "A" }, { name: "B" }])]);
      store.queuePage("A", page("a/1", [5_000, '{"unit":"A"}']));
      const reports: CycleReport[] = [];
      const poller: Poller = build(
        { logStreamName: "x", useLogStreamNamePrefix: true },
        { onCycleComplete: (report: CycleReport) => reports.push(report) }
      );
      store.beforeGetEvents = (stream) => {
        if (stream === "A") {
          void poller.scheduler.stop();
        }
      };

      await poller.scheduler.start();

      expect(reports).toHaveLength(1);
      expect(reports[0]?.skipped).toEqual(["B"]);
      expect(emitted).toEqual([["cw.checkout", 5, { unit: "A", _stream: "A" }]]);
      await expect(poller.cursors.load("A")).resolves.toBe("a/1");
      expect(store.getEventsCalls.map((call) => call.stream)).toEqual(["A"]);
      expect(poller.scheduler.getState()).toBe("stopped");
    });

    it("start 之前调用 stop 时循环不会执行任何周期", async () => {
      const { scheduler } = build({});

      await scheduler.stop();
      await scheduler.start();

      expect(store.getEventsCalls).toEqual([]);
      expect(scheduler.getState()).toBe("stopped");
    });
  });
});
