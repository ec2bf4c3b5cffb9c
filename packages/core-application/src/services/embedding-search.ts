import type { ChunkHash, ProjectId, RelativePath } from "@code-sync/core-domain";

import type { EmbeddingProvider } from "../ports/embedding-provider";
import type { EmbeddingStore } from "../ports/embedding-store";
import type { TreeSnapshotStore } from "../ports/snapshot-store";
import type { VectorCipher } from "../ports/vector-cipher";

export type SearchHit = {
  chunkHash: ChunkHash;
  score: number;
  /** Paths in the acknowledged snapshot that contain this chunk. */
  paths: RelativePath[];
};

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Nearest-chunk lookup over one project's acknowledged snapshot. Vectors are
 * decrypted in memory for the duration of the query only.
 */
export class EmbeddingSearch {
  constructor(
    private readonly deps: {
      provider: EmbeddingProvider;
      store: EmbeddingStore;
      snapshots: TreeSnapshotStore;
      cipher: VectorCipher;
    }
  ) {}

  async query(projectId: ProjectId, text: string, k: number, signal?: AbortSignal): Promise<SearchHit[]> {
    if (k <= 0) return [];

    const snapshot = await this.deps.snapshots.loadAcknowledged(projectId);
    if (!snapshot) return [];

    const pathsByChunk = new Map<ChunkHash, RelativePath[]>();
    for (const [p, hashes] of Object.entries(snapshot.chunkHashesByPath)) {
      for (const h of hashes) {
        const paths = pathsByChunk.get(h) ?? [];
        if (!paths.includes(p)) paths.push(p);
        pathsByChunk.set(h, paths);
      }
    }
    if (pathsByChunk.size === 0) return [];

    const queryVector = await this.deps.provider.embed(text, signal);
    const hits: SearchHit[] = [];
    for (const record of await this.deps.store.list()) {
      const paths = pathsByChunk.get(record.chunkHash);
      if (!paths) continue;
      hits.push({
        chunkHash: record.chunkHash,
        score: cosineSimilarity(queryVector, this.deps.cipher.decrypt(record)),
        paths,
      });
    }

    hits.sort((a, b) => b.score - a.score || (a.chunkHash < b.chunkHash ? -1 : 1));
    return hits.slice(0, k);
  }
}
