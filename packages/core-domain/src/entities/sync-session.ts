import type { ChangeSet } from "./change-set";
import type { EmbeddingRecord } from "./embedding-record";
import type { MerkleTree } from "./tree-node";
import type { TreeSnapshot } from "./snapshot";
import type { ChunkHash, Digest, ProjectId, RelativePath } from "../value-objects/ids";

export type RejectionReason =
  | "HashMismatch"
  | "NotInChangeSet"
  | "ContentUnavailable"
  | "EmbeddingProviderError";

export type RejectedPath = {
  path: RelativePath;
  reason: RejectionReason;
};

export type AcceptedFile = {
  /** Leaf hash the file was accepted under. */
  contentHash: Digest;
  chunkHashes: ChunkHash[];
  records: EmbeddingRecord[];
};

/**
 * Server-side state of one sync cycle. Lives in memory only; dropping it
 * leaves the acknowledged snapshot untouched.
 */
export interface SyncSession {
  projectId: ProjectId;
  startedAtMs: number;
  clientTree: MerkleTree;
  baseline: TreeSnapshot | null;
  changeSet: ChangeSet;
  /** Negotiated leaf hash for every path the client still has to send. */
  outstanding: Map<RelativePath, Digest>;
  accepted: Map<RelativePath, AcceptedFile>;
  rejected: Map<RelativePath, RejectionReason>;
  removalsProcessed: boolean;
}
