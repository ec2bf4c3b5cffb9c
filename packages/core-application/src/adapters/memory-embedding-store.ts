import type { ChunkHash, EmbeddingRecord } from "@code-sync/core-domain";
import type { EmbeddingStore } from "../ports/embedding-store";

export class InMemoryEmbeddingStore implements EmbeddingStore {
  private readonly records = new Map<ChunkHash, EmbeddingRecord>();

  async upsertEmbedding(record: EmbeddingRecord): Promise<{ stored: boolean }> {
    if (this.records.has(record.chunkHash)) return { stored: false };
    this.records.set(record.chunkHash, { ...record });
    return { stored: true };
  }

  async has(chunkHash: ChunkHash): Promise<boolean> {
    return this.records.has(chunkHash);
  }

  async remove(chunkHashes: ChunkHash[]): Promise<number> {
    let removed = 0;
    for (const hash of chunkHashes) {
      if (this.records.delete(hash)) removed += 1;
    }
    return removed;
  }

  async list(): Promise<EmbeddingRecord[]> {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }
}
