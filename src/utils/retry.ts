import { sleep } from './sleep.js';

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Return false to rethrow immediately (auth errors, bad requests). */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number) => void;
}

/** HTTP status carried by SDK errors (openai, @anthropic-ai/sdk, @google/genai). */
export function errorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' ? status : undefined;
}

/** Rate limits, timeouts, 5xx and network errors are worth another attempt. */
export function isTransientError(err: unknown): boolean {
  const status = errorStatus(err);
  if (status == null) return true;
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt += 1;
      if (attempt > opts.retries) throw err;
      if (opts.shouldRetry && !opts.shouldRetry(err)) throw err;
      opts.onRetry?.(err, attempt);

      const message = err instanceof Error ? err.message : String(err);
      const retryDelayMatch = message.match(/"retryDelay"\s*:\s*"(\d+)s"/);
      if (retryDelayMatch?.[1]) {
        const seconds = Number(retryDelayMatch[1]);
        if (Number.isFinite(seconds) && seconds > 0) {
          await sleep(Math.min(opts.maxDelayMs, seconds * 1000));
          continue;
        }
      }

      const backoff = Math.min(opts.maxDelayMs, opts.baseDelayMs * 2 ** (attempt - 1));
      const jitter = Math.floor(Math.random() * 250);
      await sleep(backoff + jitter);
    }
  }
}
