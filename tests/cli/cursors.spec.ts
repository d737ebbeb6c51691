import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { formatPersistedCursor, listPersistedCursors } from "../../src/cli/cursors.js";
import { resolveStateBasePath } from "../../src/shared/environment/pathResolver.js";
import { CursorFileStore } from "../../src/shared/persistence/CursorFileStore.js";

describe("listPersistedCursors", () => {
  let dir: string;
  let basePath: string;
  let store: CursorFileStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "logpull-cli-cursors-"));
    basePath = join(dir, "cursor");
    store = new CursorFileStore({ basePath });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("按文件名排序列出已保存的游标并解码流名", async () => {
    await store.save("web-2", "f/2");
    await store.save("2024/05/01/[$LATEST]abc", "f/lambda");
    await store.save("web-1", "f/1");

    const cursors = await listPersistedCursors(store, basePath);

    expect(cursors).toEqual([
      { stream: "2024/05/01/[$LATEST]abc", filePath: store.pathFor("2024/05/01/[$LATEST]abc"), token: "f/lambda" },
      { stream: "web-1", filePath: store.pathFor("web-1"), token: "f/1" },
      { stream: "web-2", filePath: store.pathFor("web-2"), token: "f/2" }
    ]);
  });

  it("忽略其他基路径、临时文件以及无法还原的文件名", async () => {
    await store.save("web-1", "f/1");
    await writeFile(join(dir, "other_web-1"), "f/x", "utf-8");
    await writeFile(join(dir, ".cursor_web-1.1234.tmp"), "f/tmp", "utf-8");
    await writeFile(join(dir, "cursor_bad%zz"), "f/bad", "utf-8");
    await writeFile(join(dir, "cursor_a b"), "f/space", "utf-8");

    const cursors = await listPersistedCursors(store, basePath);

    expect(cursors.map((entry) => entry.stream)).toEqual(["web-1"]);
  });

  it("含 .. 的基路径经解析后仍能列出游标", async () => {
    const statePath = resolveStateBasePath(`${dir}/sub/../cursor`);
    const viaDotDot = new CursorFileStore({ basePath: statePath });
    await viaDotDot.save("web", "f/1");

    const cursors = await listPersistedCursors(viaDotDot, statePath);

    expect(cursors).toEqual([{ stream: "web", filePath: join(dir, "cursor_web"), token: "f/1" }]);
  });

  it("空文件的令牌为 null", async () => {
    await writeFile(`${basePath}_idle`, "\n", "utf-8");

    const [entry] = await listPersistedCursors(store, basePath);

    expect(entry?.token).toBeNull();
  });

  it("目录不存在时返回空列表", async () => {
    const missing = join(dir, "missing", "cursor");

    await expect(listPersistedCursors(new CursorFileStore({ basePath: missing }), missing)).resolves.toEqual([]);
  });
});

describe("formatPersistedCursor", () => {
  it("格式化单行输出", () => {
    expect(formatPersistedCursor({ stream: "web-1", filePath: "/s/cursor_web-1", token: "f/1" })).toBe(
      "- web-1 | token=f/1 | file=/s/cursor_web-1"
    );
    expect(formatPersistedCursor({ stream: "idle", filePath: "/s/cursor_idle", token: null })).toBe(
      "- idle | token=(empty) | file=/s/cursor_idle"
    );
  });
});
