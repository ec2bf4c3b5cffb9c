import type { Digest } from "../value-objects/ids";

export type NodeKind = "file" | "directory";

export interface FileNode {
  readonly kind: "file";
  readonly name: string;
  readonly hash: Digest;
  readonly size: number;
  readonly mtimeMs: number;
}

export interface DirectoryNode {
  readonly kind: "directory";
  readonly name: string;
  readonly hash: Digest;
  /** Always sorted by name (UTF-16 code unit order). */
  readonly children: readonly TreeNode[];
}

export type TreeNode = FileNode | DirectoryNode;

export interface MerkleTree {
  readonly rootHash: Digest;
  readonly root: DirectoryNode;
  readonly fileCount: number;
}

/**
 * Name ordering used everywhere a tree is hashed or walked. Plain code unit
 * comparison keeps it independent of the host locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isDirectory(node: TreeNode): node is DirectoryNode {
  return node.kind === "directory";
}
