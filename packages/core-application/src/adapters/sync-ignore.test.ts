import path from "node:path";
import { describe, expect, it } from "vitest";

import { createSyncIgnore, parseIgnoreRules, toAbsoluteIgnore } from "./sync-ignore";

describe("createSyncIgnore", () => {
  const ignore = createSyncIgnore([
    "# build output",
    "",
    "dist/",
    "*.log",
    "!keep.log",
    "src/generated/**",
  ]);

  it("applies the built-in rules", () => {
    expect(ignore(".git", true)).toBe(true);
    expect(ignore("packages/app/node_modules", true)).toBe(true);
    expect(ignore(".env", false)).toBe(true);
    expect(ignore("notes/.DS_Store", false)).toBe(true);
  });

  it("matches directory-only rules against directories alone", () => {
    expect(ignore("dist", true)).toBe(true);
    expect(ignore("dist", false)).toBe(false);
  });

  it("lets a later negation re-include a path", () => {
    expect(ignore("logs/error.log", false)).toBe(true);
    expect(ignore("keep.log", false)).toBe(false);
    expect(ignore("logs/keep.log", false)).toBe(false);
  });

  it("anchors patterns that contain a slash", () => {
    expect(ignore("src/generated/api.ts", false)).toBe(true);
    expect(ignore("lib/src/generated/api.ts", false)).toBe(false);
    expect(ignore("src/main.ts", false)).toBe(false);
  });

  it("skips comments and blank lines", () => {
    expect(parseIgnoreRules("# a\n\n  \n*.tmp\n")).toEqual([
      { pattern: "*.tmp", negated: false, directoryOnly: false, anchored: false },
    ]);
  });
});

describe("toAbsoluteIgnore", () => {
  const root = path.resolve("/work/project");
  const ignore = toAbsoluteIgnore(root, createSyncIgnore());

  it("checks every parent directory of the path", () => {
    expect(ignore(path.join(root, "node_modules", "x", "index.js"))).toBe(true);
    expect(ignore(path.join(root, "src", "a.ts"))).toBe(false);
    expect(ignore(root)).toBe(false);
  });

  it("ignores anything outside the root", () => {
    expect(ignore(path.resolve("/work/other/a.ts"))).toBe(true);
  });
});
