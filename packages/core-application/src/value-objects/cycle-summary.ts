import type { ChangeSet, Digest, ProjectId, RejectedPath, RelativePath } from "@code-sync/core-domain";

/**
 * - up-to-date: probe matched, nothing sent
 * - synced: committed with every changed path accepted
 * - partial: committed, but some paths were rejected and wait for the next cycle
 * - degraded: gave up on transient failures; the server kept its previous snapshot
 * - failed: the cycle could not produce a consistent snapshot
 * - cancelled: aborted through the signal
 */
export type SyncCycleStatus = "up-to-date" | "synced" | "partial" | "degraded" | "failed" | "cancelled";

export type SyncCycleSummary = {
  status: SyncCycleStatus;
  projectId: ProjectId;
  /** Root hash of the tree built this cycle; null when building failed. */
  rootHash: Digest | null;
  /** Root hash the server acknowledged at the end of the cycle, if known. */
  acknowledgedRootHash: Digest | null;
  changeSet: ChangeSet;
  accepted: RelativePath[];
  rejected: RejectedPath[];
  /** Paths that still differ on the server and will be sent again next cycle. */
  pendingRetry: RelativePath[];
  removed: RelativePath[];
  warnings: string[];
  /** Transport retries spent during the cycle. */
  retries: number;
  durationMs: number;
  error?: string;
};
