/**
 * 指数退避重试
 *
 * 仅用于本地 I/O（游标文件读写）的瞬态错误；远端调用不在此重试，
 * 失败直接交给调度循环，由下一个周期自然重试。
 */

import { createLoggerFacade } from "../logging/logger.js";

const logger = createLoggerFacade("retry");

export interface RetryAttempt {
  readonly error: Error;
  readonly attemptNumber: number;
  readonly retriesLeft: number;
}

export interface RetryOptions {
  /**
   * 最大重试次数，默认 3
   */
  retries?: number;

  /**
   * 基础延迟(ms)，第 n 次重试等待 baseDelay * 2^(n-1)，默认 100
   */
  baseDelay?: number;

  /**
   * 单次等待上限(ms)，默认 5000
   */
  maxDelay?: number;

  onFailedAttempt?: (attempt: RetryAttempt) => void;

  /**
   * 返回 false 时立即失败，不再重试
   */
  shouldRetry?: (attempt: RetryAttempt) => boolean;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateBackoff(attemptNumber: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * Math.pow(2, attemptNumber - 1), maxDelay);
}

/**
 * @example
 * ```ts
 * const token = await retryWithBackoff(() => readFile(path, "utf-8"), {
 *   shouldRetry: ({ error }) => isTransientFsError(error)
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    retries = 3,
    baseDelay = 100,
    maxDelay = 5000,
    onFailedAttempt,
    shouldRetry = () => true
  } = options;

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const retriesLeft = retries + 1 - attemptNumber;
      const attempt: RetryAttempt = { error: err, attemptNumber, retriesLeft };

      if (retriesLeft <= 0 || !shouldRetry(attempt)) {
        throw err;
      }

      if (onFailedAttempt) {
        onFailedAttempt(attempt);
      } else {
        logger.warn("Operation failed, retrying", {
          attemptNumber,
          retriesLeft,
          error: err.message
        });
      }

      await delay(calculateBackoff(attemptNumber, baseDelay, maxDelay));
    }
  }
}

const TRANSIENT_FS_CODES = new Set(["EBUSY", "EPERM", "EAGAIN", "EMFILE", "ENFILE"]);

/**
 * 文件系统瞬态错误：文件被占用、描述符耗尽等。ENOENT、EISDIR 等直接失败。
 */
export function isTransientFsError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === "string" && TRANSIENT_FS_CODES.has(code);
}
