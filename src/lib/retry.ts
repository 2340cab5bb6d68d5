/**
 * Retry helper with exponential backoff and jitter
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryOptions = {
  retries: number; // e.g. 3
  baseDelayMs: number; // e.g. 50
  maxDelayMs: number; // e.g. 2000
  jitterRatio?: number; // e.g. 0.2
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; err: unknown }) => void;
};

/**
 * Runs `fn`, retrying failures accepted by `shouldRetry` up to `retries` times.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const jitterRatio = opts.jitterRatio ?? 0.2;

  let attempt = 0;
  // attempt: 0 = first run, 1..retries on failure

  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= opts.retries || !opts.shouldRetry(err)) {
        throw err;
      }

      attempt += 1;

      const exp = Math.pow(2, attempt - 1);
      const raw = Math.min(opts.maxDelayMs, opts.baseDelayMs * exp);
      const jitter = raw * jitterRatio * (Math.random() * 2 - 1); // +/- jitter
      const delayMs = Math.max(0, Math.round(raw + jitter));

      opts.onRetry?.({ attempt, delayMs, err });
      await sleep(delayMs);
    }
  }
}
