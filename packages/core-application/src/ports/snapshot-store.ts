import type { Digest, ProjectId, TreeSnapshot } from "@code-sync/core-domain";

export interface TreeSnapshotStore {
  loadAcknowledged(projectId: ProjectId): Promise<TreeSnapshot | null>;
  load(projectId: ProjectId, rootHash: Digest): Promise<TreeSnapshot | null>;
  /** Persists the snapshot and makes it the project's acknowledged one in a single step. */
  commit(snapshot: TreeSnapshot, acknowledgedAtMs: number): Promise<void>;
  listAcknowledged(): Promise<Array<{ snapshot: TreeSnapshot; acknowledgedAtMs: number }>>;
}
