export type RetryContext = {
  /** 1-based. */
  attempt: number;
  startedAt: number;
  lastError?: unknown;
};

/**
 * Exponential backoff settings. `maxAttempts` counts the first call, so 1
 * means no retry at all.
 */
export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0.2 spreads each delay by +/- 20%. */
  jitterRatio: number;
  shouldRetry: (err: unknown) => boolean;
};

/** Waits `ms`; rejects early when `signal` aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
