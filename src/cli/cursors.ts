import { readdir } from "node:fs/promises";
import path from "node:path";

import type { CursorStore } from "../shared/persistence/CursorFileStore.js";

export interface PersistedCursor {
  readonly stream: string;
  readonly filePath: string;
  readonly token: string | null;
}

/**
 * 扫描基路径所在目录，找出 `<basename>_<编码流名>` 形式的游标文件。
 * 临时文件（以 . 开头）不计入。
 */
export async function listPersistedCursors(store: CursorStore, basePath: string): Promise<PersistedCursor[]> {
  const directory = path.dirname(basePath);
  const prefix = `${path.basename(basePath)}_`;

  let files: string[];
  try {
    files = await readdir(directory);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  const cursors: PersistedCursor[] = [];
  for (const file of files.sort()) {
    if (!file.startsWith(prefix)) {
      continue;
    }
    const stream = decodeStreamName(file.slice(prefix.length));
    if (stream === null || store.pathFor(stream) !== path.join(directory, file)) {
      continue;
    }
    cursors.push({ stream, filePath: store.pathFor(stream), token: await store.load(stream) });
  }
  return cursors;
}

function decodeStreamName(encoded: string): string | null {
  try {
    return decodeURIComponent(encoded);
  } catch {
    return null;
  }
}

export function formatPersistedCursor(entry: PersistedCursor): string {
  return `- ${entry.stream} | token=${entry.token ?? "(empty)"} | file=${entry.filePath}`;
}
