import { describe, expect, it } from "vitest";

import { computeHorizon } from "../../src/poller/index.js";

describe("computeHorizon", () => {
  it("未配置天数时没有下界", () => {
    expect(computeHorizon(undefined, Date.UTC(2024, 0, 10))).toBeUndefined();
  });

  it("now - N 天，截断到整秒", () => {
    expect(computeHorizon(2, Date.UTC(2024, 0, 10, 8, 30, 15, 999))).toBe(Date.UTC(2024, 0, 8, 8, 30, 15));
  });

  it("0 天即当前时刻", () => {
    expect(computeHorizon(0, 1_700_000_000_123)).toBe(1_700_000_000_000);
  });
});
