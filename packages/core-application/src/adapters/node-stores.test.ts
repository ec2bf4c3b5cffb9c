import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { EmbeddingRecord, TreeSnapshot } from "@code-sync/core-domain";
import { NodeTreeSnapshotStore } from "./node-snapshot-store";
import { NodeEmbeddingStore } from "./node-embedding-store";
import { buildTreeFromRecords } from "../services/merkle-tree-builder";
import { serializeTree } from "../services/tree-serialization";
import { sha256Hex } from "../services/digest";
import { makeTempDir } from "../testing/fakes";

function snapshotOf(projectId: string, files: Record<string, string>, createdAtMs = 1000): TreeSnapshot {
  const tree = buildTreeFromRecords(
    Object.entries(files).map(([p, content]) => ({ path: p, contentHash: sha256Hex(content), size: content.length, mtimeMs: 0 }))
  );
  const chunkHashesByPath: Record<string, string[]> = {};
  for (const [p, content] of Object.entries(files)) chunkHashesByPath[p] = [sha256Hex(content)];
  return { projectId, rootHash: tree.rootHash, createdAtMs, tree: serializeTree(tree), chunkHashesByPath };
}

function record(text: string): EmbeddingRecord {
  return { chunkHash: sha256Hex(text), encryptedVector: "Y2lwaGVy", nonce: "bm9uY2U=", keyId: "k1" };
}

describe("NodeTreeSnapshotStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("has nothing acknowledged for a new project", async () => {
    const store = new NodeTreeSnapshotStore(dataDir);
    expect(await store.loadAcknowledged("fresh")).toBeNull();
    expect(await store.listAcknowledged()).toEqual([]);
  });

  it("moves the acknowledged pointer on commit and keeps older snapshots loadable", async () => {
    const store = new NodeTreeSnapshotStore(dataDir);
    const v1 = snapshotOf("alpha", { "a.txt": "one" });
    const v2 = snapshotOf("alpha", { "a.txt": "two" }, 2000);

    await store.commit(v1, 1500);
    await store.commit(v2, 2500);

    expect(await store.loadAcknowledged("alpha")).toEqual(v2);
    expect(await store.load("alpha", v1.rootHash)).toEqual(v1);

    // a second instance over the same directory sees the same state
    const reopened = new NodeTreeSnapshotStore(dataDir);
    expect(await reopened.listAcknowledged()).toEqual([{ snapshot: v2, acknowledgedAtMs: 2500 }]);
  });

  it("keeps only the acknowledged snapshot and the one before it", async () => {
    const store = new NodeTreeSnapshotStore(dataDir);
    const versions = ["v1", "v2", "v3", "v4", "v5"].map((v, i) => snapshotOf("alpha", { "a.txt": v }, i));
    for (const [i, snapshot] of versions.entries()) await store.commit(snapshot, i);

    const files = await fs.readdir(path.join(dataDir, "snapshots", sha256Hex("alpha")));
    expect(files.sort()).toEqual(
      ["acknowledged.json", `${versions[3]?.rootHash}.json`, `${versions[4]?.rootHash}.json`].sort()
    );
    expect(await store.load("alpha", versions[0]?.rootHash ?? "")).toBeNull();
    expect(await store.loadAcknowledged("alpha")).toEqual(versions[4]);
  });

  it("lists projects sorted by id", async () => {
    const store = new NodeTreeSnapshotStore(dataDir);
    await store.commit(snapshotOf("zeta", { "z.txt": "z" }), 1);
    await store.commit(snapshotOf("alpha", { "a.txt": "a" }), 2);

    const listed = await store.listAcknowledged();
    expect(listed.map((e) => e.snapshot.projectId)).toEqual(["alpha", "zeta"]);
  });

  it("refuses a snapshot file that does not match the schema", async () => {
    const store = new NodeTreeSnapshotStore(dataDir);
    const v1 = snapshotOf("alpha", { "a.txt": "one" });
    await store.commit(v1, 1);

    const file = path.join(dataDir, "snapshots", sha256Hex("alpha"), `${v1.rootHash}.json`);
    await fs.writeFile(file, JSON.stringify({ projectId: "alpha" }), "utf-8");

    await expect(store.loadAcknowledged("alpha")).rejects.toThrow();
  });
});

describe("NodeEmbeddingStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("stores each chunk hash once", async () => {
    const store = new NodeEmbeddingStore(dataDir);

    expect(await store.upsertEmbedding(record("x"))).toEqual({ stored: true });
    expect(await store.upsertEmbedding(record("x"))).toEqual({ stored: false });
    expect(await store.has(sha256Hex("x"))).toBe(true);
    expect(await store.list()).toEqual([record("x")]);
  });

  it("removes records and ignores hashes it never had", async () => {
    const store = new NodeEmbeddingStore(dataDir);
    await store.upsertEmbedding(record("x"));
    await store.upsertEmbedding(record("y"));

    expect(await store.remove([sha256Hex("x"), sha256Hex("never")])).toBe(1);
    expect(await store.has(sha256Hex("x"))).toBe(false);
    expect(await store.list()).toEqual([record("y")]);
  });

  it("rejects a chunk hash that is not a digest", async () => {
    const store = new NodeEmbeddingStore(dataDir);
    await expect(store.has("../escape")).rejects.toThrow('Invalid chunk hash "../escape"');
  });
});
