import type { Chunk, ChunkHash, EmbeddingRecord, RelativePath } from "@code-sync/core-domain";

import type { EmbeddingProvider } from "../ports/embedding-provider";
import type { EmbeddingStore } from "../ports/embedding-store";
import type { VectorCipher } from "../ports/vector-cipher";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";

import { chunkContent, DEFAULT_MAX_CHUNK_CHARS } from "./chunker";
import { withRetry } from "../application/with-retry";
import {
  defaultEmbeddingRetryPolicy,
  defaultNetworkRetryPolicy,
} from "../application/default-network-retry-policy";
import { EncryptionError, describeError, type ChunkTooLargeError } from "../application/errors";
import { sleep } from "../infra/sleep";

export type ChunkFailure = {
  chunk: Chunk;
  error: string;
};

export type FileEmbeddingResult = {
  path: RelativePath;
  /** Every chunk hash of the file, in order, including the ones already stored. */
  chunkHashes: ChunkHash[];
  /** Newly encrypted records, not yet upserted. */
  records: EmbeddingRecord[];
  failures: ChunkFailure[];
  warnings: ChunkTooLargeError[];
};

export type EmbeddingPipelineDeps = {
  provider: EmbeddingProvider;
  cipher: VectorCipher;
  store: EmbeddingStore;
  logger: Logger;
  maxChunkChars?: number;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
};

/**
 * chunk -> embed -> encrypt for one verified file. Records come back staged;
 * nothing reaches the store until the caller commits them through an
 * EmbeddingUpserter.
 */
export class EmbeddingPipeline {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;

  constructor(private readonly deps: EmbeddingPipelineDeps) {
    this.retryPolicy = deps.retryPolicy ?? defaultEmbeddingRetryPolicy();
    this.sleeper = deps.sleeper ?? sleep;
  }

  async processFile(
    path: RelativePath,
    content: string,
    options: { staged?: ReadonlySet<ChunkHash>; signal?: AbortSignal } = {}
  ): Promise<FileEmbeddingResult> {
    const { provider, cipher, store, logger } = this.deps;
    const { slices, warnings } = chunkContent({
      path,
      content,
      maxChars: this.deps.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS,
    });

    for (const w of warnings) {
      logger.warn("oversized chunk kept whole", { path, line: w.line, size: w.size, limit: w.limit });
    }

    const records: EmbeddingRecord[] = [];
    const failures: ChunkFailure[] = [];
    const seen = new Set<ChunkHash>(options.staged ?? []);

    for (const { chunk, text } of slices) {
      const hash = chunk.contentHash;
      if (seen.has(hash)) continue;
      seen.add(hash);

      if (await store.has(hash)) continue;

      let vector: number[];
      try {
        vector = await withRetry(() => provider.embed(text, options.signal), this.retryPolicy, this.sleeper, {
          signal: options.signal,
          onRetry: ({ attempt, delayMs }) =>
            logger.debug("embedding retry", { path, chunkIndex: chunk.chunkIndex, attempt, delayMs }),
        });
      } catch (err) {
        if (options.signal?.aborted) throw err;
        failures.push({ chunk, error: describeError(err) });
        logger.warn("embedding failed for chunk", { path, chunkIndex: chunk.chunkIndex, error: describeError(err) });
        continue;
      }

      let record: EmbeddingRecord;
      try {
        record = cipher.encrypt(hash, vector);
      } catch (err) {
        if (err instanceof EncryptionError) throw err;
        throw new EncryptionError(`Failed to encrypt embedding for ${path}#${chunk.chunkIndex}`, err);
      }
      records.push(record);
    }

    return {
      path,
      chunkHashes: slices.map((s) => s.chunk.contentHash),
      records,
      failures,
      warnings,
    };
  }
}

/** Pushes encrypted records to the vector index, retrying transient failures. */
export class EmbeddingUpserter {
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly store: EmbeddingStore,
    retryPolicy?: RetryPolicy,
    private readonly sleeper: Sleeper = sleep
  ) {
    this.retryPolicy = retryPolicy ?? defaultNetworkRetryPolicy();
  }

  async upsert(records: EmbeddingRecord[]): Promise<number> {
    let stored = 0;
    for (const record of records) {
      const res = await withRetry(() => this.store.upsertEmbedding(record), this.retryPolicy, this.sleeper);
      if (res.stored) stored += 1;
    }
    return stored;
  }
}
