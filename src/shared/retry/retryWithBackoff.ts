/**
 * 指数退避重试
 *
 * 用于持久化层的瞬态错误容错，以及执行监督器的重试延迟计算。
 */

import { createLoggerFacade } from "../logging/logger.js";

const logger = createLoggerFacade("retry");

export interface FailedAttempt {
  error: Error;
  attemptNumber: number;
  retriesLeft: number;
}

export interface RetryOptions {
  /**
   * 最大重试次数,默认3次
   */
  retries?: number;

  /**
   * 基础延迟(ms),默认100ms
   */
  baseDelay?: number;

  onFailedAttempt?: (params: FailedAttempt) => void;

  /**
   * 返回 false 时立即失败
   */
  shouldRetry?: (params: FailedAttempt) => boolean;
}

const TRANSIENT_FS_CODES = new Set(["EBUSY", "EPERM", "EAGAIN", "EMFILE", "ENFILE"]);

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 第 n 次重试（从 0 开始）的等待时间：base * 2^n
 */
export function computeBackoff(baseDelay: number, retryIndex: number): number {
  return baseDelay * Math.pow(2, Math.max(0, retryIndex));
}

/**
 * 沿 cause 链查找 Node.js 错误码
 */
export function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const code: unknown = Reflect.get(current, "code");
    if (typeof code === "string" && code.length > 0 && code === code.toUpperCase()) {
      return code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isTransientFsError({ error }: { error: Error }): boolean {
  const code = findErrorCode(error);
  return code !== undefined && TRANSIENT_FS_CODES.has(code);
}

/**
 * @example
 * ```ts
 * const record = await retryWithBackoff(() => repository.read(id), {
 *   retries: 3,
 *   shouldRetry: isTransientFsError
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
    onFailedAttempt,
    shouldRetry = () => true
  } = options;

  let lastError: Error | undefined;

  for (let attemptNumber = 1; attemptNumber <= retries + 1; attemptNumber++) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      lastError = err;

      const retriesLeft = retries + 1 - attemptNumber;
      if (retriesLeft === 0) {
        throw err;
      }
      if (!shouldRetry({ error: err, attemptNumber, retriesLeft })) {
        throw err;
      }

      if (onFailedAttempt) {
        onFailedAttempt({ error: err, attemptNumber, retriesLeft });
      } else {
        logger.warn("Operation failed, retrying", {
          attemptNumber,
          retriesLeft,
          error: err.message
        });
      }

      await delay(computeBackoff(baseDelay, attemptNumber - 1));
    }
  }

  throw lastError ?? new Error("Retry failed with unknown error");
}
