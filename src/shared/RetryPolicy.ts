function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type BackoffStrategy = 'exponential' | 'none';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** 'none'：每次重試都等 baseDelayMs，不加倍也不加 jitter */
  backoff?: BackoffStrategy;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

function delayFor(attempt: number, opts: RetryOptions): number {
  if (opts.backoff === 'none') return opts.baseDelayMs;
  return opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
}

/**
 * 重試策略，預設指數退避 + jitter
 * 總嘗試次數 = 1（初始） + maxRetries
 */
export async function withRetry<T>(
  operation: (attempt: number) => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && opts.isRetryable(err)) {
        opts.onRetry?.(attempt + 1, err);
        const delay = delayFor(attempt, opts);
        if (delay > 0) await sleep(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
