import {
  compareNames,
  type ChangeSet,
  type DirectoryNode,
  type MerkleTree,
  type RelativePath,
  type TreeNode,
} from "@code-sync/core-domain";

function join(prefix: string, name: string): RelativePath {
  return prefix === "" ? name : `${prefix}/${name}`;
}

function collectFiles(node: TreeNode, at: RelativePath, out: RelativePath[]): void {
  if (node.kind === "file") {
    out.push(at);
    return;
  }
  for (const child of node.children) collectFiles(child, join(at, child.name), out);
}

/**
 * Walks both directories in name order. Equal hashes prune the whole
 * subtree, so the cost follows the number of changed subtrees.
 */
function diffDirectories(
  previous: DirectoryNode,
  current: DirectoryNode,
  at: RelativePath,
  out: ChangeSet
): void {
  if (previous.hash === current.hash) return;

  const prev = previous.children;
  const curr = current.children;
  let i = 0;
  let j = 0;

  while (i < prev.length || j < curr.length) {
    const p = i < prev.length ? prev[i] : undefined;
    const c = j < curr.length ? curr[j] : undefined;
    const order = p && c ? compareNames(p.name, c.name) : p ? -1 : 1;

    if (order < 0 && p) {
      collectFiles(p, join(at, p.name), out.removed);
      i += 1;
      continue;
    }
    if (order > 0 && c) {
      collectFiles(c, join(at, c.name), out.added);
      j += 1;
      continue;
    }
    if (!p || !c) break;

    const childPath = join(at, p.name);
    i += 1;
    j += 1;

    if (p.hash === c.hash && p.kind === c.kind) continue;

    if (p.kind === "file" && c.kind === "file") {
      out.modified.push(childPath);
    } else if (p.kind === "directory" && c.kind === "directory") {
      diffDirectories(p, c, childPath, out);
    } else {
      // file <-> directory swap at the same name
      collectFiles(p, childPath, out.removed);
      collectFiles(c, childPath, out.added);
    }
  }
}

/**
 * Minimal change set between two snapshots of one project. Only files are
 * reported. A rename shows up as removed + added; there is no rename
 * detection. `previous === null` means nothing was synced yet.
 */
export function diffTrees(previous: MerkleTree | null, current: MerkleTree): ChangeSet {
  const out: ChangeSet = { added: [], modified: [], removed: [] };

  if (previous === null) {
    collectFiles(current.root, "", out.added);
  } else {
    diffDirectories(previous.root, current.root, "", out);
  }

  out.added.sort(compareNames);
  out.modified.sort(compareNames);
  out.removed.sort(compareNames);
  return out;
}
