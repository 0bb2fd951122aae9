import { errorMessage, isTransient, retryAfterMsOf } from "../errors.js";
import { log } from "../logger.js";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

/** Resolves after `ms`, or early (without throwing) when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelay(attempt: number, policy: RetryPolicy, retryAfterMs?: number, rand = Math.random): number {
  if (retryAfterMs && retryAfterMs > 0) return Math.min(retryAfterMs, policy.maxDelayMs);
  const exponential = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const jitter = Math.floor(rand() * Math.max(25, policy.baseDelayMs / 2));
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 * Non-transient errors and the last transient one are rethrown.
 */
export async function withRetry<T>(
  name: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= policy.maxRetries || !isTransient(err) || signal?.aborted) throw err;
      const delay = backoffDelay(attempt, policy, retryAfterMsOf(err));
      log.warn(`[RETRY] ${name} transient failure, retrying`, {
        attempt: attempt + 1,
        delayMs: delay,
        err: errorMessage(err),
      });
      await sleep(delay, signal);
    }
  }
}

/** Reject with `onTimeout()` if `p` has not settled within `ms`. */
export function withTimeout<T>(p: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
}
