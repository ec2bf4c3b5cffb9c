import type { ChunkHash, EmbeddingRecord } from "@code-sync/core-domain";
import type { EmbeddingVector } from "./embedding-provider";

export interface VectorCipher {
  readonly activeKeyId: string;
  encrypt(chunkHash: ChunkHash, vector: EmbeddingVector): EmbeddingRecord;
  decrypt(record: EmbeddingRecord): EmbeddingVector;
}
