import type { ChunkHash, Digest, ProjectId, RelativePath } from "../value-objects/ids";
import type { NodeKind } from "./tree-node";

export type SerializedNode = {
  name: string;
  kind: NodeKind;
  hash: Digest;
  size?: number;
  mtimeMs?: number;
  children?: SerializedNode[];
};

export type SerializedTree = {
  version: 1;
  rootHash: Digest;
  root: SerializedNode;
};

/**
 * Acknowledged server-side state of one project. Keyed by project id and
 * root hash; the last committed one is the project's acknowledged snapshot.
 */
export interface TreeSnapshot {
  projectId: ProjectId;
  rootHash: Digest;
  createdAtMs: number;
  tree: SerializedTree;
  /** Chunk hashes embedded for each indexed path, used for eviction. */
  chunkHashesByPath: Record<RelativePath, ChunkHash[]>;
}
