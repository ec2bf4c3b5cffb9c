import type { RelativePath } from "@code-sync/core-domain";

export class EnumerationError extends Error {
  constructor(message: string, public readonly rootDir: string, public cause?: unknown) {
    super(message);
    this.name = "EnumerationError";
  }
}

export class HashMismatchError extends Error {
  constructor(
    public readonly path: RelativePath,
    public readonly claimedHash: string,
    public readonly actualHash: string
  ) {
    super(`Content hash mismatch for ${path}: claimed ${claimedHash}, got ${actualHash}`);
    this.name = "HashMismatchError";
  }
}

export class TransientNetworkError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "TransientNetworkError";
  }
}

export class RemoteRateLimitedError extends Error {
  constructor(message: string, public retryAfterSeconds?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteRateLimitedError";
  }
}

export class RemoteServerError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteServerError";
  }
}

/** The peer answered, but not in a way the protocol allows. Not retried. */
export class SyncProtocolError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "SyncProtocolError";
  }
}

export class NoActiveSessionError extends Error {
  constructor(public readonly projectId: string) {
    super(`No sync session in progress for project ${projectId}`);
    this.name = "NoActiveSessionError";
  }
}

export class TreeIntegrityError extends Error {
  constructor(message: string, public readonly path?: string) {
    super(message);
    this.name = "TreeIntegrityError";
  }
}

/** Fatal: encryption never falls back to plaintext. */
export class EncryptionError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "EncryptionError";
  }
}

export class ChunkTooLargeError extends Error {
  constructor(
    public readonly path: RelativePath,
    public readonly line: number,
    public readonly size: number,
    public readonly limit: number
  ) {
    super(`Line ${line} of ${path} is ${size} chars, above the ${limit} char chunk budget`);
    this.name = "ChunkTooLargeError";
  }
}

export class EmbeddingProviderError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    public statusCode?: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = "EmbeddingProviderError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
