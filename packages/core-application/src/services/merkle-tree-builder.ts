import {
  compareNames,
  type DirectoryNode,
  type Digest,
  type FileNode,
  type FileRecord,
  type MerkleTree,
  type RejectedFile,
  type TreeNode,
} from "@code-sync/core-domain";

import { sha256Hex } from "./digest";
import { enumerateFiles, type EnumerateOptions } from "./file-enumerator";
import { TreeIntegrityError } from "../application/errors";

/**
 * Directory digest: SHA-256 over `name NUL hash LF` for every child, children
 * taken in name order. The caller's order never matters.
 */
export function hashDirectory(children: ReadonlyArray<{ name: string; hash: Digest }>): Digest {
  const sorted = [...children].sort((a, b) => compareNames(a.name, b.name));
  return sha256Hex(sorted.map((c) => `${c.name}\0${c.hash}\n`).join(""));
}

export function makeDirectoryNode(name: string, children: TreeNode[]): DirectoryNode {
  const sorted = [...children].sort((a, b) => compareNames(a.name, b.name));
  return { kind: "directory", name, hash: hashDirectory(sorted), children: sorted };
}

type DraftDir = {
  dirs: Map<string, DraftDir>;
  files: Map<string, FileNode>;
};

function newDraft(): DraftDir {
  return { dirs: new Map(), files: new Map() };
}

function finalize(name: string, draft: DraftDir): DirectoryNode {
  const children: TreeNode[] = [...draft.files.values()];
  for (const [childName, child] of draft.dirs) {
    children.push(finalize(childName, child));
  }
  return makeDirectoryNode(name, children);
}

/**
 * Assembles the tree bottom-up from enumerated records. Only files create
 * directories, so empty directories never show up.
 */
export function buildTreeFromRecords(records: Iterable<FileRecord>): MerkleTree {
  const root = newDraft();
  let fileCount = 0;

  for (const record of records) {
    const segments = record.path.split("/");
    if (segments.some((s) => s === "" || s === "." || s === "..")) {
      throw new TreeIntegrityError(`Invalid file path "${record.path}"`, record.path);
    }

    let dir = root;
    for (const segment of segments.slice(0, -1)) {
      if (dir.files.has(segment)) {
        throw new TreeIntegrityError(`"${record.path}" goes through a file`, record.path);
      }
      let next = dir.dirs.get(segment);
      if (!next) {
        next = newDraft();
        dir.dirs.set(segment, next);
      }
      dir = next;
    }

    const name = segments[segments.length - 1];
    if (dir.files.has(name) || dir.dirs.has(name)) {
      throw new TreeIntegrityError(`Duplicate entry "${record.path}"`, record.path);
    }
    dir.files.set(name, {
      kind: "file",
      name,
      hash: record.contentHash,
      size: record.size,
      mtimeMs: record.mtimeMs,
    });
    fileCount += 1;
  }

  const rootNode = finalize("", root);
  return { rootHash: rootNode.hash, root: rootNode, fileCount };
}

export type BuildResult = {
  tree: MerkleTree;
  rejected: RejectedFile[];
};

/** Enumerates `rootDir` and builds its tree. Throws EnumerationError on a bad root. */
export async function buildMerkleTree(rootDir: string, options: EnumerateOptions = {}): Promise<BuildResult> {
  const { records, rejected } = await enumerateFiles(rootDir, options);
  return { tree: buildTreeFromRecords(records), rejected };
}
