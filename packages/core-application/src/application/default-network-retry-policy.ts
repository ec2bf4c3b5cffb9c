import type { RetryPolicy } from "../ports/retry-policy";
import {
  EmbeddingProviderError,
  RemoteRateLimitedError,
  RemoteServerError,
  TransientNetworkError,
} from "./errors";

export function isTransientFailure(err: unknown): boolean {
  if (err instanceof TransientNetworkError) return true;
  if (err instanceof RemoteRateLimitedError) return true;
  if (err instanceof RemoteServerError) {
    return err.statusCode === undefined || err.statusCode >= 500;
  }
  return false;
}

export function defaultNetworkRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 5,
    baseDelayMs: 300,
    maxDelayMs: 5000,
    jitterRatio: 0.2,
    shouldRetry: isTransientFailure,
    ...overrides,
  };
}

export function defaultEmbeddingRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 4000,
    jitterRatio: 0.2,
    shouldRetry: (err) =>
      (err instanceof EmbeddingProviderError && err.retryable) || err instanceof TransientNetworkError,
    ...overrides,
  };
}
