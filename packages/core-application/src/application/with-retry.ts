import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";
import { isAbortError } from "./errors";

export type WithRetryOptions = {
  signal?: AbortSignal;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  random?: () => number;
};

export class RetryBudgetExceededError extends Error {
  constructor(public readonly attempts: number, public cause?: unknown) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = "RetryBudgetExceededError";
  }
}

/**
 * attempt is 1-based: the first retry waits baseDelayMs, then it doubles up
 * to maxDelayMs, with +/- jitterRatio applied.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitter = capped * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export async function withRetry<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleeper: Sleeper,
  options: WithRetryOptions = {}
): Promise<T> {
  const ctx: RetryContext = { attempt: 1, startedAt: Date.now() };

  for (;;) {
    try {
      return await fn(ctx);
    } catch (err) {
      ctx.lastError = err;

      if (isAbortError(err) || options.signal?.aborted) throw err;
      if (!policy.shouldRetry(err)) throw err;
      if (ctx.attempt >= policy.maxAttempts) {
        throw new RetryBudgetExceededError(ctx.attempt, err);
      }

      const delayMs = computeBackoffDelay(ctx.attempt, policy, options.random);
      options.onRetry?.({ ...ctx, delayMs });
      await sleeper(delayMs, options.signal);
      ctx.attempt += 1;
    }
  }
}
