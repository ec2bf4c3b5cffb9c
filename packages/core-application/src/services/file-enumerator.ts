import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import pLimit from "p-limit";

import { compareNames, type FileRecord, type RejectedFile } from "@code-sync/core-domain";
import type { ContentHasher } from "../ports/content-hasher";
import { NodeContentHasher } from "../adapters/node-content-hasher";
import { EnumerationError, describeError } from "../application/errors";

export type IgnorePredicate = (relPath: string, isDirectory: boolean) => boolean;

export type EnumerateOptions = {
  ignore?: IgnorePredicate;
  hasher?: ContentHasher;
  /** Max files hashed at once. */
  concurrency?: number;
};

export type EnumerationResult = {
  records: FileRecord[];
  rejected: RejectedFile[];
};

const DEFAULT_CONCURRENCY = 8;

async function assertReadableRoot(rootAbs: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(rootAbs);
  } catch (err) {
    throw new EnumerationError(`Project root ${rootAbs} does not exist or cannot be read`, rootAbs, err);
  }
  if (!stat.isDirectory()) {
    throw new EnumerationError(`Project root ${rootAbs} is not a directory`, rootAbs);
  }
  try {
    await fs.readdir(rootAbs);
  } catch (err) {
    throw new EnumerationError(`Project root ${rootAbs} cannot be listed`, rootAbs, err);
  }
}

/**
 * Walks `rootDir` depth-first and returns one record per tracked file, sorted
 * by path. Symlinks are not followed. Entries that cannot be read end up in
 * `rejected` instead of failing the walk; only a bad root is fatal.
 */
export async function enumerateFiles(
  rootDir: string,
  options: EnumerateOptions = {}
): Promise<EnumerationResult> {
  const rootAbs = path.resolve(rootDir);
  const ignore = options.ignore ?? (() => false);
  const hasher = options.hasher ?? new NodeContentHasher();

  await assertReadableRoot(rootAbs);

  const files: string[] = [];
  const rejected: RejectedFile[] = [];

  async function walk(relDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(rootAbs, relDir), { withFileTypes: true });
    } catch (err) {
      rejected.push({ path: relDir, reason: describeError(err) });
      return;
    }

    entries.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
      const rel = relDir === "" ? entry.name : `${relDir}/${entry.name}`;

      if (entry.isDirectory()) {
        if (ignore(rel, true)) continue;
        await walk(rel);
      } else if (entry.isFile()) {
        if (ignore(rel, false)) continue;
        files.push(rel);
      }
    }
  }

  await walk("");

  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
  const results = await Promise.all(
    files.map((rel) =>
      limit(async (): Promise<FileRecord | RejectedFile> => {
        const abs = path.join(rootAbs, ...rel.split("/"));
        try {
          const stat = await fs.stat(abs);
          const contentHash = await hasher.digestFile(abs);
          return { path: rel, contentHash, size: stat.size, mtimeMs: stat.mtimeMs };
        } catch (err) {
          return { path: rel, reason: describeError(err) };
        }
      })
    )
  );

  const records: FileRecord[] = [];
  for (const r of results) {
    if ("contentHash" in r) records.push(r);
    else rejected.push(r);
  }

  records.sort((a, b) => compareNames(a.path, b.path));
  rejected.sort((a, b) => compareNames(a.path, b.path));

  return { records, rejected };
}
