import type { FileNode, MerkleTree, RelativePath, TreeNode } from "@code-sync/core-domain";

export type IndexedNode = {
  path: RelativePath;
  node: TreeNode;
  /** Index of the parent slot, -1 for the root. */
  parent: number;
  depth: number;
};

/**
 * Flat, arena-style view over a tree. Nodes keep no parent pointers; parent
 * links live here as slot indices so ancestor queries don't need a re-walk.
 * The root has path "".
 */
export class TreeIndex {
  private readonly slots: IndexedNode[] = [];
  private readonly byPath = new Map<RelativePath, number>();

  constructor(readonly tree: MerkleTree) {
    this.visit(tree.root, "", -1, 0);
  }

  private visit(node: TreeNode, nodePath: RelativePath, parent: number, depth: number): void {
    const slot = this.slots.length;
    this.slots.push({ path: nodePath, node, parent, depth });
    this.byPath.set(nodePath, slot);

    if (node.kind === "directory") {
      for (const child of node.children) {
        const childPath = nodePath === "" ? child.name : `${nodePath}/${child.name}`;
        this.visit(child, childPath, slot, depth + 1);
      }
    }
  }

  get size(): number {
    return this.slots.length;
  }

  lookup(nodePath: RelativePath): TreeNode | undefined {
    const slot = this.byPath.get(nodePath);
    return slot === undefined ? undefined : this.slots[slot].node;
  }

  hashOf(nodePath: RelativePath): string | undefined {
    return this.lookup(nodePath)?.hash;
  }

  /** Ancestors from the immediate parent up to the root. Empty for unknown paths. */
  ancestorsOf(nodePath: RelativePath): IndexedNode[] {
    const slot = this.byPath.get(nodePath);
    if (slot === undefined) return [];

    const out: IndexedNode[] = [];
    let cursor = this.slots[slot].parent;
    while (cursor !== -1) {
      out.push(this.slots[cursor]);
      cursor = this.slots[cursor].parent;
    }
    return out;
  }

  /** Files keyed by path, in walk (name) order. */
  files(): Map<RelativePath, FileNode> {
    const out = new Map<RelativePath, FileNode>();
    for (const s of this.slots) {
      if (s.node.kind === "file") out.set(s.path, s.node);
    }
    return out;
  }
}

export function indexTree(tree: MerkleTree): TreeIndex {
  return new TreeIndex(tree);
}
