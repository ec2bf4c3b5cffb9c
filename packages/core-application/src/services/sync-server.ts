import {
  changedPaths,
  compareNames,
  isEmptyChangeSet,
  type ChunkHash,
  type Digest,
  type EmbeddingRecord,
  type FileNode,
  type FileRecord,
  type MerkleTree,
  type ProjectId,
  type RejectedPath,
  type RejectionReason,
  type RelativePath,
  type SyncSession,
  type TreeSnapshot,
} from "@code-sync/core-domain";

import type { TreeSnapshotStore } from "../ports/snapshot-store";
import type { EmbeddingStore } from "../ports/embedding-store";
import type { Logger } from "../ports/logger";
import { systemClock, type Clock } from "../ports/clock";
import type { EmbeddingPipeline, EmbeddingUpserter } from "./embedding-pipeline";
import type {
  FilePayload,
  HealthResponse,
  NegotiateRequest,
  NegotiateResponse,
  ProbeRequest,
  ProbeResponse,
  ProjectsResponse,
  PushChangesRequest,
  PushChangesResponse,
  PushRemovalsRequest,
  PushRemovalsResponse,
} from "../value-objects/wire";

import { diffTrees } from "./tree-differ";
import { indexTree } from "./tree-index";
import { buildTreeFromRecords } from "./merkle-tree-builder";
import { deserializeTree, serializeTree } from "./tree-serialization";
import { sha256Hex } from "./digest";
import { KeyedMutex } from "../infra/keyed-mutex";
import { silentLogger } from "../adapters/console-logger";
import { HashMismatchError, NoActiveSessionError, describeError } from "../application/errors";

export type SyncServerDeps = {
  snapshots: TreeSnapshotStore;
  embeddings: EmbeddingStore;
  pipeline: EmbeddingPipeline;
  upserter: EmbeddingUpserter;
  clock?: Clock;
  logger?: Logger;
};

type Verdict = { accepted: true; warnings: string[] } | { accepted: false; rejection: RejectedPath };

/**
 * Outcome of the last committed session, kept until the project negotiates
 * again so that a push resent after a lost response gets the same answer.
 */
type FinishedCycle = {
  rootHash: Digest;
  accepted: Map<RelativePath, Digest>;
  rejected: Map<RelativePath, RejectionReason>;
  removed: Set<RelativePath>;
};

/**
 * Server role of the sync protocol. One in-memory session per project; a new
 * negotiate replaces whatever session was there. Nothing reaches the stores
 * until the session commits, so an abandoned cycle leaves no trace.
 */
export class SyncServer {
  private readonly sessions = new Map<ProjectId, SyncSession>();
  private readonly finished = new Map<ProjectId, FinishedCycle>();
  private readonly locks = new KeyedMutex();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly startedAtMs: number;

  constructor(private readonly deps: SyncServerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.startedAtMs = this.clock.now();
  }

  hasSession(projectId: ProjectId): boolean {
    return this.sessions.has(projectId);
  }

  async probe(request: ProbeRequest): Promise<ProbeResponse> {
    const acknowledged = await this.deps.snapshots.loadAcknowledged(request.projectId);
    const acknowledgedRootHash = acknowledged?.rootHash ?? null;
    return { upToDate: acknowledgedRootHash === request.rootHash, acknowledgedRootHash };
  }

  async negotiate(request: NegotiateRequest): Promise<NegotiateResponse> {
    return this.locks.run(request.projectId, async () => {
      const clientTree = deserializeTree(request.tree);
      this.finished.delete(request.projectId);
      const baseline = await this.deps.snapshots.loadAcknowledged(request.projectId);
      const baselineTree = baseline ? deserializeTree(baseline.tree) : null;

      const changeSet = diffTrees(baselineTree, clientTree);
      const clientFiles = indexTree(clientTree).files();
      const toSend = changedPaths(changeSet);

      const outstanding = new Map<string, Digest>();
      for (const p of toSend) {
        const leaf = clientFiles.get(p);
        if (leaf) outstanding.set(p, leaf.hash);
      }

      if (this.sessions.has(request.projectId)) {
        this.logger.info("superseding unfinished session", { projectId: request.projectId });
      }

      const session: SyncSession = {
        projectId: request.projectId,
        startedAtMs: this.clock.now(),
        clientTree,
        baseline,
        changeSet,
        outstanding,
        accepted: new Map(),
        rejected: new Map(),
        removalsProcessed: changeSet.removed.length === 0,
      };
      this.sessions.set(request.projectId, session);

      this.logger.info("negotiated", {
        projectId: request.projectId,
        added: changeSet.added.length,
        modified: changeSet.modified.length,
        removed: changeSet.removed.length,
      });

      const committedRoot = isEmptyChangeSet(changeSet) ? await this.commit(session) : null;

      return {
        changedPaths: toSend,
        removedPaths: changeSet.removed,
        changeSet,
        committed: committedRoot !== null,
        acknowledgedRootHash: committedRoot ?? baseline?.rootHash ?? null,
      };
    });
  }

  async pushChanges(request: PushChangesRequest): Promise<PushChangesResponse> {
    return this.locks.run(request.projectId, async () => {
      const session = this.sessions.get(request.projectId);
      if (!session) return this.replayChanges(request);

      const accepted: string[] = [];
      const rejected: RejectedPath[] = [];
      const warnings: string[] = [];

      for (const file of request.files) {
        let verdict: Verdict;
        try {
          verdict = await this.ingest(session, file);
        } catch (err) {
          // fatal for the cycle (EncryptionError and the like): nothing staged survives
          this.sessions.delete(session.projectId);
          this.logger.error("cycle aborted", { projectId: session.projectId, path: file.path, error: describeError(err) });
          throw err;
        }
        if (verdict.accepted) {
          accepted.push(file.path);
          warnings.push(...verdict.warnings);
        } else {
          rejected.push(verdict.rejection);
        }
      }

      const committedRoot = await this.maybeCommit(session);
      return {
        accepted,
        rejected,
        warnings,
        committed: committedRoot !== null,
        acknowledgedRootHash: committedRoot ?? session.baseline?.rootHash ?? null,
      };
    });
  }

  async pushRemovals(request: PushRemovalsRequest): Promise<PushRemovalsResponse> {
    return this.locks.run(request.projectId, async () => {
      const session = this.sessions.get(request.projectId);
      if (!session) return this.replayRemovals(request);

      const expected = new Set(session.changeSet.removed);
      const unexpected = request.paths.filter((p) => !expected.has(p));
      if (unexpected.length > 0) {
        this.logger.warn("ignoring removals outside the change set", {
          projectId: session.projectId,
          paths: unexpected,
        });
      }

      session.removalsProcessed = true;
      const committedRoot = await this.maybeCommit(session);
      return {
        ack: true,
        committed: committedRoot !== null,
        acknowledgedRootHash: committedRoot ?? session.baseline?.rootHash ?? null,
      };
    });
  }

  async health(): Promise<HealthResponse> {
    const projects = await this.deps.snapshots.listAcknowledged();
    return {
      status: "healthy",
      projectsCount: projects.length,
      uptimeMs: Math.max(0, this.clock.now() - this.startedAtMs),
    };
  }

  async listProjects(): Promise<ProjectsResponse> {
    const entries = await this.deps.snapshots.listAcknowledged();
    return {
      projects: entries.map(({ snapshot, acknowledgedAtMs }) => ({
        projectId: snapshot.projectId,
        rootHash: snapshot.rootHash,
        fileCount: Object.keys(snapshot.chunkHashesByPath).length,
        acknowledgedAtIso: new Date(acknowledgedAtMs).toISOString(),
      })),
    };
  }

  /** Answers a pushChanges resent after its session already committed. */
  private replayChanges(request: PushChangesRequest): PushChangesResponse {
    const done = this.finished.get(request.projectId);
    if (!done) throw new NoActiveSessionError(request.projectId);

    const accepted: string[] = [];
    const rejected: RejectedPath[] = [];
    for (const file of request.files) {
      const reason = done.rejected.get(file.path);
      if (done.accepted.get(file.path) === file.claimedHash) accepted.push(file.path);
      else rejected.push({ path: file.path, reason: reason ?? "NotInChangeSet" });
    }
    this.logger.info("replayed push for a committed cycle", { projectId: request.projectId, files: request.files.length });
    return { accepted, rejected, warnings: [], committed: true, acknowledgedRootHash: done.rootHash };
  }

  private replayRemovals(request: PushRemovalsRequest): PushRemovalsResponse {
    const done = this.finished.get(request.projectId);
    if (!done || !request.paths.every((p) => done.removed.has(p))) {
      throw new NoActiveSessionError(request.projectId);
    }
    return { ack: true, committed: true, acknowledgedRootHash: done.rootHash };
  }

  private stagedChunkHashes(session: SyncSession): Set<ChunkHash> {
    const staged = new Set<ChunkHash>();
    for (const file of session.accepted.values()) {
      for (const record of file.records) staged.add(record.chunkHash);
    }
    return staged;
  }

  private reject(session: SyncSession, rejection: RejectedPath): Verdict {
    session.outstanding.delete(rejection.path);
    session.rejected.set(rejection.path, rejection.reason);
    this.logger.warn("rejected file", { projectId: session.projectId, ...rejection });
    return { accepted: false, rejection };
  }

  private async ingest(session: SyncSession, file: FilePayload): Promise<Verdict> {
    const expected = session.outstanding.get(file.path);
    if (expected === undefined) {
      // a resend of a path this session already settled gets the same verdict
      if (session.accepted.get(file.path)?.contentHash === file.claimedHash) return { accepted: true, warnings: [] };
      const settled = session.rejected.get(file.path);
      // otherwise not part of this session; the session itself is left alone
      return { accepted: false, rejection: { path: file.path, reason: settled ?? "NotInChangeSet" } };
    }

    if (file.content === null) {
      return this.reject(session, { path: file.path, reason: "ContentUnavailable" });
    }

    const bytes = Buffer.from(file.content, "base64");
    const actual = sha256Hex(bytes);
    if (file.claimedHash !== expected || actual !== file.claimedHash) {
      const mismatch = new HashMismatchError(file.path, expected, actual);
      this.logger.warn(mismatch.message, { projectId: session.projectId });
      return this.reject(session, { path: file.path, reason: "HashMismatch" });
    }

    const result = await this.deps.pipeline.processFile(file.path, bytes.toString("utf8"), {
      staged: this.stagedChunkHashes(session),
    });
    if (result.failures.length > 0) {
      return this.reject(session, { path: file.path, reason: "EmbeddingProviderError" });
    }

    session.outstanding.delete(file.path);
    session.accepted.set(file.path, {
      contentHash: actual,
      chunkHashes: result.chunkHashes,
      records: result.records,
    });
    return { accepted: true, warnings: result.warnings.map((w) => w.message) };
  }

  private async maybeCommit(session: SyncSession): Promise<Digest | null> {
    if (session.outstanding.size > 0 || !session.removalsProcessed) return null;
    return this.commit(session);
  }

  /**
   * Applies a finished session: rejected paths fall back to their baseline
   * leaf (or drop out) so they show up as changed again next cycle.
   */
  private async commit(session: SyncSession): Promise<Digest> {
    const { projectId, baseline } = session;
    try {
      const committedTree = this.committedTree(session);
      const previousChunks = baseline?.chunkHashesByPath ?? {};
      const chunkHashesByPath: Record<string, ChunkHash[]> = {};
      for (const p of indexTree(committedTree).files().keys()) {
        chunkHashesByPath[p] = session.accepted.get(p)?.chunkHashes ?? previousChunks[p] ?? [];
      }

      const staged: EmbeddingRecord[] = [];
      for (const file of session.accepted.values()) staged.push(...file.records);

      const now = this.clock.now();
      const snapshot: TreeSnapshot = {
        projectId,
        rootHash: committedTree.rootHash,
        createdAtMs: now,
        tree: serializeTree(committedTree),
        chunkHashesByPath,
      };

      let stored: number;
      try {
        stored = await this.deps.upserter.upsert(staged);
        await this.deps.snapshots.commit(snapshot, now);
      } catch (err) {
        await this.rollback(projectId, staged);
        throw err;
      }

      this.finished.set(projectId, {
        rootHash: snapshot.rootHash,
        accepted: new Map([...session.accepted].map(([p, f]) => [p, f.contentHash])),
        rejected: new Map(session.rejected),
        removed: new Set(session.changeSet.removed),
      });

      const evicted = await this.evict(previousChunks);

      this.logger.info("committed", {
        projectId,
        rootHash: snapshot.rootHash,
        accepted: session.accepted.size,
        rejected: session.rejected.size,
        stored,
        evicted,
      });
      return snapshot.rootHash;
    } finally {
      this.sessions.delete(projectId);
    }
  }

  private committedTree(session: SyncSession): MerkleTree {
    if (session.rejected.size === 0) return session.clientTree;

    const baselineFiles = session.baseline
      ? indexTree(deserializeTree(session.baseline.tree)).files()
      : new Map<string, FileNode>();

    const records: FileRecord[] = [];
    for (const [p, leaf] of indexTree(session.clientTree).files()) {
      const source = session.rejected.has(p) ? baselineFiles.get(p) : leaf;
      if (!source) continue;
      records.push({ path: p, contentHash: source.hash, size: source.size, mtimeMs: source.mtimeMs });
    }
    records.sort((a, b) => compareNames(a.path, b.path));
    return buildTreeFromRecords(records);
  }

  /**
   * Chunk hashes still referenced by any project's acknowledged snapshot or
   * staged in an open session.
   */
  private async liveChunkHashes(): Promise<Set<ChunkHash>> {
    const live = new Set<ChunkHash>();
    for (const { snapshot } of await this.deps.snapshots.listAcknowledged()) {
      for (const hashes of Object.values(snapshot.chunkHashesByPath)) for (const h of hashes) live.add(h);
    }
    for (const session of this.sessions.values()) {
      for (const file of session.accepted.values()) for (const h of file.chunkHashes) live.add(h);
    }
    return live;
  }

  private async evict(before: Record<string, ChunkHash[]>): Promise<number> {
    const candidates = new Set<ChunkHash>();
    for (const hashes of Object.values(before)) for (const h of hashes) candidates.add(h);
    if (candidates.size === 0) return 0;

    const live = await this.liveChunkHashes();
    const dead = [...candidates].filter((h) => !live.has(h));
    if (dead.length === 0) return 0;
    return this.deps.embeddings.remove(dead);
  }

  /** Undoes the upsert of a commit that did not reach the snapshot store. */
  private async rollback(projectId: ProjectId, staged: EmbeddingRecord[]): Promise<void> {
    this.sessions.delete(projectId);
    const live = await this.liveChunkHashes();
    const orphans = staged.map((r) => r.chunkHash).filter((h) => !live.has(h));
    try {
      const removed = orphans.length > 0 ? await this.deps.embeddings.remove(orphans) : 0;
      this.logger.error("commit failed; staged embeddings removed", { projectId, removed });
    } catch (err) {
      this.logger.error("commit failed and staged embeddings could not be removed", {
        projectId,
        error: describeError(err),
      });
    }
  }
}
