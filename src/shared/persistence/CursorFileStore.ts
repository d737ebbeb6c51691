import { createHash, randomUUID } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { PersistenceError } from "../../poller/errors.js";
import { createLoggerFacade, type LoggerFacade } from "../logging/logger.js";
import { isTransientFsError, retryWithBackoff, type RetryOptions } from "../retry/retryWithBackoff.js";

export interface CursorFileStoreOptions {
  /**
   * 游标文件基路径（绝对路径）。每个流的文件为 `<basePath>_<编码后的流名>`。
   */
  readonly basePath: string;

  readonly retryOptions?: Partial<RetryOptions>;
}

/**
 * 游标存储接口。EventFetcher 与调度器只通过它读写游标。
 */
export interface CursorStore {
  load(streamKey: string): Promise<string | null>;
  save(streamKey: string, cursor: string): Promise<void>;
  pathFor(streamKey: string): string;
}

// 常见文件系统单个文件名上限 255 字节，另需给临时文件的 `.<name>.<uuid>.tmp` 留出 42 字节
const MAX_FILE_NAME_LENGTH = 200;
const HASH_LENGTH = 16;

// 允许首尾空白（运维手工写入时常带换行），但令牌内部不得含控制字符
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/**
 * 基于文件的游标存储
 *
 * 每个 (日志组, 日志流) 一个文件，内容为原样的续传令牌，不做任何包装，
 * 便于运维直接查看或预置。写入走「临时文件 + rename」，读者要么看到旧令牌，
 * 要么看到新令牌，不会读到写了一半的内容。
 */
export class CursorFileStore implements CursorStore {
  private readonly basePath: string;
  private readonly logger: LoggerFacade;
  private readonly retryOptions: RetryOptions;

  constructor(options: CursorFileStoreOptions) {
    this.basePath = options.basePath;
    this.logger = createLoggerFacade("cursor-store", { basePath: options.basePath });
    this.retryOptions = {
      retries: 3,
      baseDelay: 100,
      ...options.retryOptions,
      onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
        this.logger.warn("Cursor file operation failed, retrying", {
          attemptNumber,
          retriesLeft,
          error: error.message
        });
      },
      shouldRetry: ({ error }) => isTransientFsError(error)
    };
  }

  /**
   * 流名经 encodeURIComponent 编码后拼接，含 `/`、`[$LATEST]` 之类字符的流名
   * 既不会逃出状态目录，也不会互相冲突。
   *
   * 编码后文件名超过 MAX_FILE_NAME_LENGTH 时截断并追加 `#<sha256 前 16 位>`；
   * `#` 总会被 encodeURIComponent 转义，因此不会与未截断的文件名重合。
   */
  pathFor(streamKey: string): string {
    const prefixBytes = Buffer.byteLength(`${basename(this.basePath)}_`);
    const encoded = encodeURIComponent(streamKey);
    if (prefixBytes + encoded.length <= MAX_FILE_NAME_LENGTH) {
      return `${this.basePath}_${encoded}`;
    }
    const digest = createHash("sha256").update(streamKey).digest("hex").slice(0, HASH_LENGTH);
    const keep = Math.max(0, MAX_FILE_NAME_LENGTH - prefixBytes - HASH_LENGTH - 1);
    return `${this.basePath}_${encoded.slice(0, keep)}#${digest}`;
  }

  /**
   * 文件不存在或内容为空时返回 null；其余文件系统故障抛出 PersistenceError。
   */
  async load(streamKey: string): Promise<string | null> {
    const filePath = this.pathFor(streamKey);

    let raw: string;
    try {
      raw = await retryWithBackoff(() => readFile(filePath, "utf-8"), this.retryOptions);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.logger.error("Failed to read cursor", error, { streamKey, filePath });
      throw new PersistenceError(`Failed to read cursor for stream '${streamKey}'`, "read_failed", filePath, error);
    }

    const token = raw.trim();
    if (token.length === 0) {
      this.logger.warn("Cursor file is empty, treating as absent", { streamKey, filePath });
      return null;
    }
    if (CONTROL_CHARACTERS.test(token)) {
      throw new PersistenceError(
        `Cursor file for stream '${streamKey}' is corrupt; fix or remove ${filePath}`,
        "cursor_corrupt",
        filePath
      );
    }
    return token;
  }

  async save(streamKey: string, cursor: string): Promise<void> {
    const filePath = this.pathFor(streamKey);
    if (cursor.length === 0 || CONTROL_CHARACTERS.test(cursor)) {
      throw new PersistenceError(
        `Refusing to persist malformed cursor for stream '${streamKey}'`,
        "write_failed",
        filePath
      );
    }

    // 临时文件与目标同目录，保证 rename 不跨文件系统
    const tempPath = join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);

    try {
      await retryWithBackoff(async () => {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(tempPath, cursor, "utf-8");
        await rename(tempPath, filePath);
      }, this.retryOptions);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!isNotFound(cleanupError)) {
          this.logger.warn("Failed to remove temporary cursor file", {
            tempPath,
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          });
        }
      });
      this.logger.error("Atomic cursor write failed", error, { streamKey, filePath });
      throw new PersistenceError(`Failed to persist cursor for stream '${streamKey}'`, "write_failed", filePath, error);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
