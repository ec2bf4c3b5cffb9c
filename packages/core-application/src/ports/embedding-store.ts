import type { ChunkHash, EmbeddingRecord } from "@code-sync/core-domain";

/** Vector index holding encrypted embeddings keyed by chunk hash. */
export interface EmbeddingStore {
  upsertEmbedding(record: EmbeddingRecord): Promise<{ stored: boolean }>;
  has(chunkHash: ChunkHash): Promise<boolean>;
  remove(chunkHashes: ChunkHash[]): Promise<number>;
  list(): Promise<EmbeddingRecord[]>;
}
