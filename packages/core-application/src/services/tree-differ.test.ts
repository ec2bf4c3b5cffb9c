import { describe, expect, it } from "vitest";

import type { FileRecord } from "@code-sync/core-domain";
import { buildTreeFromRecords } from "./merkle-tree-builder";
import { diffTrees } from "./tree-differ";
import { sha256Hex } from "./digest";

function tree(files: Record<string, string>) {
  const records: FileRecord[] = Object.entries(files).map(([p, content]) => ({
    path: p,
    contentHash: sha256Hex(content),
    size: content.length,
    mtimeMs: 0,
  }));
  return buildTreeFromRecords(records);
}

describe("diffTrees", () => {
  const base = { "d/a.txt": "hello", "d/b.txt": "world", "src/x.ts": "x" };

  it("is empty for an unchanged tree", () => {
    expect(diffTrees(tree(base), tree(base))).toEqual({ added: [], modified: [], removed: [] });
  });

  it("reports every file as added on first sync", () => {
    expect(diffTrees(null, tree(base))).toEqual({
      added: ["d/a.txt", "d/b.txt", "src/x.ts"],
      modified: [],
      removed: [],
    });
  });

  it("finds modified, added and removed files", () => {
    const next = { "d/b.txt": "world!", "src/x.ts": "x", "src/y.ts": "y" };
    expect(diffTrees(tree(base), tree(next))).toEqual({
      added: ["src/y.ts"],
      modified: ["d/b.txt"],
      removed: ["d/a.txt"],
    });
  });

  it("reports every file under a removed directory", () => {
    expect(diffTrees(tree(base), tree({ "src/x.ts": "x" }))).toEqual({
      added: [],
      modified: [],
      removed: ["d/a.txt", "d/b.txt"],
    });
  });

  it("treats a file that became a directory as removed plus added", () => {
    const before = tree({ x: "file" });
    const after = tree({ "x/inner.txt": "file" });
    expect(diffTrees(before, after)).toEqual({ added: ["x/inner.txt"], modified: [], removed: ["x"] });
    expect(diffTrees(after, before)).toEqual({ added: ["x"], modified: [], removed: ["x/inner.txt"] });
  });

  it("treats a rename as removed plus added", () => {
    const after: Record<string, string> = { ...base, "d/renamed.txt": "hello" };
    delete after["d/a.txt"];
    expect(diffTrees(tree(base), tree(after))).toEqual({
      added: ["d/renamed.txt"],
      modified: [],
      removed: ["d/a.txt"],
    });
  });
});
