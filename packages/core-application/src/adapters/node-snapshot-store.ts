import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { Digest, ProjectId, TreeSnapshot } from "@code-sync/core-domain";
import type { TreeSnapshotStore } from "../ports/snapshot-store";
import { sha256Hex } from "../services/digest";
import { DigestSchema, ProjectIdSchema, TreeSnapshotSchema } from "../value-objects/wire";

const AckPointerSchema = z.object({
  projectId: ProjectIdSchema,
  rootHash: DigestSchema,
  acknowledgedAtMs: z.number().nonnegative(),
});
type AckPointer = z.infer<typeof AckPointerSchema>;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function writeAtomic(file: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
  await fs.writeFile(tmp, data, "utf-8");
  await fs.rename(tmp, file);
}

async function readJson(file: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Snapshots live under `<dataDir>/snapshots/<sha256(projectId)>/`, one file
 * per root hash, plus `acknowledged.json` naming the last committed one. Only
 * the acknowledged snapshot and its predecessor are kept on disk. The
 * pointer is only rewritten after the snapshot file is in place, and both
 * writes go through a rename, so a crash leaves the previous state readable.
 */
export class NodeTreeSnapshotStore implements TreeSnapshotStore {
  constructor(private readonly dataDir: string) {}

  private snapshotsRoot(): string {
    return path.join(this.dataDir, "snapshots");
  }

  private projectDir(projectId: ProjectId): string {
    return path.join(this.snapshotsRoot(), sha256Hex(projectId));
  }

  private snapshotFile(projectId: ProjectId, rootHash: Digest): string {
    return path.join(this.projectDir(projectId), `${DigestSchema.parse(rootHash)}.json`);
  }

  private pointerFile(projectId: ProjectId): string {
    return path.join(this.projectDir(projectId), "acknowledged.json");
  }

  private async readPointer(file: string): Promise<AckPointer | null> {
    const raw = await readJson(file);
    return raw === null ? null : AckPointerSchema.parse(raw);
  }

  async load(projectId: ProjectId, rootHash: Digest): Promise<TreeSnapshot | null> {
    const raw = await readJson(this.snapshotFile(projectId, rootHash));
    return raw === null ? null : TreeSnapshotSchema.parse(raw);
  }

  async loadAcknowledged(projectId: ProjectId): Promise<TreeSnapshot | null> {
    const pointer = await this.readPointer(this.pointerFile(projectId));
    if (!pointer) return null;
    return this.load(projectId, pointer.rootHash);
  }

  async commit(snapshot: TreeSnapshot, acknowledgedAtMs: number): Promise<void> {
    const previous = await this.readPointer(this.pointerFile(snapshot.projectId));
    await writeAtomic(this.snapshotFile(snapshot.projectId, snapshot.rootHash), JSON.stringify(snapshot));

    const pointer: AckPointer = {
      projectId: snapshot.projectId,
      rootHash: snapshot.rootHash,
      acknowledgedAtMs,
    };
    await writeAtomic(this.pointerFile(snapshot.projectId), JSON.stringify(pointer, null, 2));

    const keep = new Set([`${snapshot.rootHash}.json`, "acknowledged.json"]);
    if (previous) keep.add(`${previous.rootHash}.json`);
    await this.prune(snapshot.projectId, keep);
  }

  /** Drops every snapshot file but the acknowledged one and the one it replaced. */
  private async prune(projectId: ProjectId, keep: ReadonlySet<string>): Promise<void> {
    const dir = this.projectDir(projectId);
    for (const name of await fs.readdir(dir)) {
      if (keep.has(name) || !name.endsWith(".json")) continue;
      await fs.rm(path.join(dir, name), { force: true });
    }
  }

  async listAcknowledged(): Promise<Array<{ snapshot: TreeSnapshot; acknowledgedAtMs: number }>> {
    let dirs: string[];
    try {
      dirs = await fs.readdir(this.snapshotsRoot());
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const out: Array<{ snapshot: TreeSnapshot; acknowledgedAtMs: number }> = [];
    for (const dir of dirs.sort()) {
      const pointer = await this.readPointer(path.join(this.snapshotsRoot(), dir, "acknowledged.json"));
      if (!pointer) continue;
      const snapshot = await this.load(pointer.projectId, pointer.rootHash);
      if (snapshot) out.push({ snapshot, acknowledgedAtMs: pointer.acknowledgedAtMs });
    }
    return out.sort((a, b) => (a.snapshot.projectId < b.snapshot.projectId ? -1 : 1));
  }
}
