import type { Digest, ProjectId, TreeSnapshot } from "@code-sync/core-domain";
import type { TreeSnapshotStore } from "../ports/snapshot-store";

export class InMemoryTreeSnapshotStore implements TreeSnapshotStore {
  private readonly snapshots = new Map<string, TreeSnapshot>();
  private readonly acknowledged = new Map<ProjectId, { rootHash: Digest; acknowledgedAtMs: number }>();

  private key(projectId: ProjectId, rootHash: Digest) {
    return `${projectId}\0${rootHash}`;
  }

  async load(projectId: ProjectId, rootHash: Digest): Promise<TreeSnapshot | null> {
    return structuredClone(this.snapshots.get(this.key(projectId, rootHash))) ?? null;
  }

  async loadAcknowledged(projectId: ProjectId): Promise<TreeSnapshot | null> {
    const ack = this.acknowledged.get(projectId);
    return ack ? this.load(projectId, ack.rootHash) : null;
  }

  async commit(snapshot: TreeSnapshot, acknowledgedAtMs: number): Promise<void> {
    const previous = this.acknowledged.get(snapshot.projectId)?.rootHash;
    this.snapshots.set(this.key(snapshot.projectId, snapshot.rootHash), structuredClone(snapshot));
    for (const [key, kept] of this.snapshots) {
      if (kept.projectId !== snapshot.projectId) continue;
      if (kept.rootHash !== snapshot.rootHash && kept.rootHash !== previous) this.snapshots.delete(key);
    }
    this.acknowledged.set(snapshot.projectId, { rootHash: snapshot.rootHash, acknowledgedAtMs });
  }

  async listAcknowledged(): Promise<Array<{ snapshot: TreeSnapshot; acknowledgedAtMs: number }>> {
    const out: Array<{ snapshot: TreeSnapshot; acknowledgedAtMs: number }> = [];
    for (const [projectId, ack] of [...this.acknowledged].sort(([a], [b]) => (a < b ? -1 : 1))) {
      const snapshot = await this.load(projectId, ack.rootHash);
      if (snapshot) out.push({ snapshot, acknowledgedAtMs: ack.acknowledgedAtMs });
    }
    return out;
  }
}
