import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";

import type { IgnorePredicate } from "../services/file-enumerator";
import { toPosix } from "../services/digest";

export const SYNC_IGNORE_FILE = ".syncignore";

/** Never synced, whatever `.syncignore` says. */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  ".git/",
  ".code-sync/",
  "node_modules/",
  ".env",
  ".gitignore",
  ".DS_Store",
  "*~",
  "*.swp",
  "*.tmp",
];

type Rule = {
  pattern: string;
  negated: boolean;
  directoryOnly: boolean;
  /** Patterns without a slash match the basename at any depth. */
  anchored: boolean;
};

function parseRule(line: string): Rule | null {
  let text = line.trim();
  if (text === "" || text.startsWith("#")) return null;

  const negated = text.startsWith("!");
  if (negated) text = text.slice(1);

  const directoryOnly = text.endsWith("/");
  if (directoryOnly) text = text.replace(/\/+$/, "");

  const anchored = text.includes("/");
  text = text.replace(/^\/+/, "");
  if (text === "") return null;

  return { pattern: text, negated, directoryOnly, anchored };
}

export function parseIgnoreRules(source: string): Rule[] {
  const rules: Rule[] = [];
  for (const line of source.split(/\r?\n/)) {
    const rule = parseRule(line);
    if (rule) rules.push(rule);
  }
  return rules;
}

function matches(rule: Rule, relPath: string): boolean {
  const opts = { dot: true };
  if (rule.anchored) return minimatch(relPath, rule.pattern, opts);
  return minimatch(path.posix.basename(relPath), rule.pattern, opts);
}

/**
 * Ignore predicate over project-relative posix paths. Rules apply in order
 * and the last match wins, so a later `!pattern` re-includes a path.
 * Directories that are ignored are never walked, so their contents cannot be
 * re-included.
 */
export function createSyncIgnore(extraPatterns: readonly string[] = []): IgnorePredicate {
  const rules = parseIgnoreRules([...DEFAULT_IGNORE_PATTERNS, ...extraPatterns].join("\n"));

  return (relPath: string, isDirectory: boolean) => {
    const rel = toPosix(relPath);
    let ignored = false;
    for (const rule of rules) {
      if (rule.directoryOnly && !isDirectory) continue;
      if (matches(rule, rel)) ignored = !rule.negated;
    }
    return ignored;
  };
}

/** Reads `<rootDir>/.syncignore` if present and combines it with the defaults. */
export async function loadSyncIgnore(rootDir: string): Promise<IgnorePredicate> {
  let source = "";
  try {
    source = await fs.readFile(path.join(rootDir, SYNC_IGNORE_FILE), "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
  }
  return createSyncIgnore(source.split(/\r?\n/));
}

/**
 * Adapts a relative-path predicate to the watcher, which hands out absolute
 * paths. Anything outside the root is ignored.
 */
export function toAbsoluteIgnore(rootDir: string, ignore: IgnorePredicate): (absPath: string) => boolean {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);
    if (p === root) return false;

    const rel = toPosix(path.relative(root, p));
    if (rel.startsWith("../") || rel === ".." || path.isAbsolute(rel)) return true;

    // chokidar doesn't say whether the path is a directory; check both shapes
    const segments = rel.split("/");
    for (let i = 1; i < segments.length; i++) {
      if (ignore(segments.slice(0, i).join("/"), true)) return true;
    }
    return ignore(rel, false) || ignore(rel, true);
  };
}
