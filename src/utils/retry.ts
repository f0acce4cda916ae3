import { setTimeout as delay } from 'timers/promises';

export type RetryOptions = {
  /** Retries after the first attempt; 2 means at most 3 calls. */
  retries: number;
  baseDelayMs: number;
  factor?: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const defaultSleep = async (ms: number, signal?: AbortSignal) => {
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
};

/**
 * Calls `fn` until it succeeds, a non-retryable error is thrown, or retries run out.
 * Backoff is exponential: base, base*factor, base*factor^2...
 * The last error is rethrown as-is.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const factor = opts.factor ?? 2;
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt > opts.retries || !opts.shouldRetry(err) || opts.signal?.aborted) {
        throw err;
      }
      const delayMs = opts.baseDelayMs * factor ** (attempt - 1);
      opts.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs, opts.signal);
    }
  }
}
