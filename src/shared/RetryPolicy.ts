function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** 單次等待上限（預設不設限） */
  maxDelayMs?: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** 測試可注入，避免真的等待 */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && opts.isRetryable(err)) {
        const raw = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
        const delay = opts.maxDelayMs !== undefined ? Math.min(raw, opts.maxDelayMs) : raw;
        opts.onRetry?.(attempt + 1, err, delay);
        await sleep(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
