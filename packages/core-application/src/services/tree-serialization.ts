import {
  compareNames,
  type DirectoryNode,
  type MerkleTree,
  type SerializedNode,
  type SerializedTree,
  type TreeNode,
} from "@code-sync/core-domain";

import { SerializedTreeSchema } from "../value-objects/wire";
import { hashDirectory } from "./merkle-tree-builder";
import { TreeIntegrityError } from "../application/errors";

function serializeNode(node: TreeNode): SerializedNode {
  if (node.kind === "file") {
    return { name: node.name, kind: "file", hash: node.hash, size: node.size, mtimeMs: node.mtimeMs };
  }
  return {
    name: node.name,
    kind: "directory",
    hash: node.hash,
    children: node.children.map(serializeNode),
  };
}

export function serializeTree(tree: MerkleTree): SerializedTree {
  return { version: 1, rootHash: tree.rootHash, root: serializeNode(tree.root) };
}

function isValidName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !name.includes("/") && !name.includes("\0");
}

type Counter = { files: number };

function restoreNode(data: SerializedNode, at: string, counter: Counter): TreeNode {
  if (data.kind === "file") {
    if (data.children && data.children.length > 0) {
      throw new TreeIntegrityError(`File "${at}" has children`, at);
    }
    counter.files += 1;
    return {
      kind: "file",
      name: data.name,
      hash: data.hash,
      size: data.size ?? 0,
      mtimeMs: data.mtimeMs ?? 0,
    };
  }

  const children: TreeNode[] = [];
  let previous: string | null = null;
  for (const child of data.children ?? []) {
    const childPath = at === "" ? child.name : `${at}/${child.name}`;
    if (!isValidName(child.name)) {
      throw new TreeIntegrityError(`Invalid entry name "${child.name}" under "${at}"`, childPath);
    }
    if (previous !== null && compareNames(previous, child.name) >= 0) {
      throw new TreeIntegrityError(`Children of "${at}" are unsorted or duplicated`, childPath);
    }
    previous = child.name;
    children.push(restoreNode(child, childPath, counter));
  }

  if (at !== "" && children.length === 0) {
    throw new TreeIntegrityError(`Empty directory "${at}"`, at);
  }

  const expected = hashDirectory(children);
  if (expected !== data.hash) {
    throw new TreeIntegrityError(`Directory hash mismatch at "${at || "/"}"`, at);
  }

  const dir: DirectoryNode = { kind: "directory", name: data.name, hash: data.hash, children };
  return dir;
}

/**
 * Parses and re-verifies a serialized tree. Every directory hash is
 * recomputed from its children; leaf hashes are taken as given.
 */
export function deserializeTree(input: unknown): MerkleTree {
  const parsed = SerializedTreeSchema.safeParse(input);
  if (!parsed.success) {
    throw new TreeIntegrityError(`Malformed tree: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  const data = parsed.data;
  if (data.root.kind !== "directory") {
    throw new TreeIntegrityError("Tree root must be a directory");
  }

  const counter: Counter = { files: 0 };
  const root = restoreNode(data.root, "", counter);
  if (root.kind !== "directory") {
    throw new TreeIntegrityError("Tree root must be a directory");
  }
  if (root.hash !== data.rootHash) {
    throw new TreeIntegrityError("Root hash does not match the root node");
  }

  return { rootHash: root.hash, root, fileCount: counter.files };
}
