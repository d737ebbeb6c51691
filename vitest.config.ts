import { tmpdir } from "node:os";
import { join } from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.spec.ts"],
    environment: "node",
    globals: false,
    env: {
      // 测试期间日志与状态写入临时目录，避免污染用户目录
      LOGPULL_HOME: join(tmpdir(), "logpull-vitest-home"),
      LOG_LEVEL: "warn"
    }
  }
});
