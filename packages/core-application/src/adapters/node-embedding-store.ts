import fs from "node:fs/promises";
import path from "node:path";

import type { ChunkHash, EmbeddingRecord } from "@code-sync/core-domain";
import type { EmbeddingStore } from "../ports/embedding-store";
import { DigestSchema, EmbeddingRecordSchema } from "../value-objects/wire";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One JSON file per chunk hash under `<dataDir>/embeddings`. Records are
 * content addressed, so upserting a hash that is already present is a no-op.
 */
export class NodeEmbeddingStore implements EmbeddingStore {
  constructor(private readonly dataDir: string) {}

  private recordsDir() {
    return path.join(this.dataDir, "embeddings");
  }

  private recordPath(chunkHash: ChunkHash) {
    // the hash names a file, so it has to be a plain digest
    const parsed = DigestSchema.safeParse(chunkHash);
    if (!parsed.success) throw new Error(`Invalid chunk hash "${chunkHash}"`);
    return path.join(this.recordsDir(), `${parsed.data}.json`);
  }

  async has(chunkHash: ChunkHash): Promise<boolean> {
    try {
      await fs.stat(this.recordPath(chunkHash));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async upsertEmbedding(record: EmbeddingRecord): Promise<{ stored: boolean }> {
    if (await this.has(record.chunkHash)) return { stored: false };

    const target = this.recordPath(record.chunkHash);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.mkdir(this.recordsDir(), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(record), "utf-8");
    await fs.rename(tmp, target);
    return { stored: true };
  }

  async remove(chunkHashes: ChunkHash[]): Promise<number> {
    let removed = 0;
    for (const hash of chunkHashes) {
      try {
        await fs.rm(this.recordPath(hash));
        removed += 1;
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }
    return removed;
  }

  async list(): Promise<EmbeddingRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.recordsDir());
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const out: EmbeddingRecord[] = [];
    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const raw = await fs.readFile(path.join(this.recordsDir(), name), "utf-8");
      out.push(EmbeddingRecordSchema.parse(JSON.parse(raw)));
    }
    return out;
  }
}
