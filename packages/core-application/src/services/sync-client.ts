import fs from "node:fs/promises";
import path from "node:path";

import {
  emptyChangeSet,
  type ChangeSet,
  type Digest,
  type MerkleTree,
  type ProjectId,
  type RejectedPath,
  type RelativePath,
} from "@code-sync/core-domain";

import type { SyncTransport } from "../ports/sync-transport";
import type { ContentHasher } from "../ports/content-hasher";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { systemClock, type Clock } from "../ports/clock";
import type { FilePayload } from "../value-objects/wire";
import type { SyncCycleStatus, SyncCycleSummary } from "../value-objects/cycle-summary";

import { buildMerkleTree } from "./merkle-tree-builder";
import { indexTree } from "./tree-index";
import { serializeTree } from "./tree-serialization";
import type { IgnorePredicate } from "./file-enumerator";
import { loadSyncIgnore } from "../adapters/sync-ignore";
import { silentLogger } from "../adapters/console-logger";
import { withRetry, RetryBudgetExceededError } from "../application/with-retry";
import { defaultNetworkRetryPolicy } from "../application/default-network-retry-policy";
import { NoActiveSessionError, describeError } from "../application/errors";
import { sleep } from "../infra/sleep";

export type SyncProject = {
  projectId: ProjectId;
  rootDir: string;
  /** Defaults to the built-in rules plus `<rootDir>/.syncignore`. */
  ignore?: IgnorePredicate;
};

export type SyncClientDeps = {
  transport: SyncTransport;
  logger?: Logger;
  clock?: Clock;
  hasher?: ContentHasher;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
  /** Decoded content bytes per pushChanges call; a larger file goes alone. */
  batchMaxBytes?: number;
  hashConcurrency?: number;
};

const DEFAULT_BATCH_MAX_BYTES = 4 * 1024 * 1024;

type CycleState = {
  tree: MerkleTree | null;
  acknowledgedRootHash: Digest | null;
  changeSet: ChangeSet;
  accepted: RelativePath[];
  rejected: RejectedPath[];
  removed: RelativePath[];
  warnings: string[];
  retries: number;
};

type PreparedFile = { payload: FilePayload; bytes: number };

/** Degraded rather than failed: the next trigger may well succeed. */
function isRecoverable(err: unknown): boolean {
  return err instanceof RetryBudgetExceededError || err instanceof NoActiveSessionError;
}

/**
 * Client role of the sync protocol: build, probe, negotiate, push. Holds no
 * state between cycles; every cycle starts over from the server's
 * acknowledged snapshot, so a crashed or cancelled cycle needs no cleanup.
 */
export class SyncClient {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;

  constructor(private readonly deps: SyncClientDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
    this.retryPolicy = deps.retryPolicy ?? defaultNetworkRetryPolicy();
    this.sleeper = deps.sleeper ?? sleep;
  }

  async runCycle(project: SyncProject, signal?: AbortSignal): Promise<SyncCycleSummary> {
    const startedAt = this.clock.now();
    const log = this.logger.child(project.projectId);
    const state: CycleState = {
      tree: null,
      acknowledgedRootHash: null,
      changeSet: emptyChangeSet(),
      accepted: [],
      rejected: [],
      removed: [],
      warnings: [],
      retries: 0,
    };

    const finish = (status: SyncCycleStatus, err?: unknown): SyncCycleSummary => {
      const summary: SyncCycleSummary = {
        status,
        projectId: project.projectId,
        rootHash: state.tree?.rootHash ?? null,
        acknowledgedRootHash: state.acknowledgedRootHash,
        changeSet: state.changeSet,
        accepted: state.accepted,
        rejected: state.rejected,
        pendingRetry: this.pendingRetry(status, state),
        removed: state.removed,
        warnings: state.warnings,
        retries: state.retries,
        durationMs: Math.max(0, this.clock.now() - startedAt),
      };
      if (err !== undefined) summary.error = describeError(err);

      const level = status === "failed" ? "error" : status === "degraded" || status === "partial" ? "warn" : "info";
      log[level]("cycle finished", {
        status,
        accepted: summary.accepted.length,
        rejected: summary.rejected.length,
        removed: summary.removed.length,
        error: summary.error,
      });
      return summary;
    };

    try {
      return await this.cycle(project, state, finish, signal);
    } catch (err) {
      if (signal?.aborted) return finish("cancelled", err);
      return finish(isRecoverable(err) ? "degraded" : "failed", err);
    }
  }

  private async cycle(
    project: SyncProject,
    state: CycleState,
    finish: (status: SyncCycleStatus, err?: unknown) => SyncCycleSummary,
    signal?: AbortSignal
  ): Promise<SyncCycleSummary> {
    signal?.throwIfAborted();

    const ignore = project.ignore ?? (await loadSyncIgnore(project.rootDir));
    const { tree, rejected } = await buildMerkleTree(project.rootDir, {
      ignore,
      hasher: this.deps.hasher,
      concurrency: this.deps.hashConcurrency,
    });
    state.tree = tree;
    for (const r of rejected) state.warnings.push(`skipped ${r.path}: ${r.reason}`);

    signal?.throwIfAborted();
    const probe = await this.retry(state, signal, (opts) =>
      this.deps.transport.probe({ projectId: project.projectId, rootHash: tree.rootHash }, opts)
    );
    state.acknowledgedRootHash = probe.acknowledgedRootHash;
    if (probe.upToDate) return finish("up-to-date");

    const negotiated = await this.retry(state, signal, (opts) =>
      this.deps.transport.negotiate({ projectId: project.projectId, tree: serializeTree(tree) }, opts)
    );
    state.changeSet = negotiated.changeSet;
    state.acknowledgedRootHash = negotiated.acknowledgedRootHash;
    let committed = negotiated.committed;

    const leaves = indexTree(tree).files();
    let batch: PreparedFile[] = [];
    let batchBytes = 0;

    const flush = async () => {
      if (batch.length === 0) return;
      const files = batch.map((f) => f.payload);
      batch = [];
      batchBytes = 0;

      const res = await this.retry(state, signal, (opts) =>
        this.deps.transport.pushChanges({ projectId: project.projectId, files }, opts)
      );
      state.accepted.push(...res.accepted);
      state.rejected.push(...res.rejected);
      state.warnings.push(...res.warnings);
      if (res.committed) {
        committed = true;
        state.acknowledgedRootHash = res.acknowledgedRootHash;
      }
    };

    for (const rel of negotiated.changedPaths) {
      signal?.throwIfAborted();
      const leaf = leaves.get(rel);
      if (!leaf) {
        state.warnings.push(`server asked for ${rel}, which is not in the local tree`);
        continue;
      }

      const prepared = await this.prepare(project.rootDir, rel, leaf.hash, state);
      if (batch.length > 0 && batchBytes + prepared.bytes > (this.deps.batchMaxBytes ?? DEFAULT_BATCH_MAX_BYTES)) {
        await flush();
      }
      batch.push(prepared);
      batchBytes += prepared.bytes;
    }
    await flush();

    if (negotiated.removedPaths.length > 0) {
      signal?.throwIfAborted();
      const res = await this.retry(state, signal, (opts) =>
        this.deps.transport.pushRemovals({ projectId: project.projectId, paths: negotiated.removedPaths }, opts)
      );
      state.removed = [...negotiated.removedPaths];
      if (res.committed) {
        committed = true;
        state.acknowledgedRootHash = res.acknowledgedRootHash;
      }
    }

    if (!committed) {
      state.warnings.push("server did not commit the cycle");
      return finish("degraded");
    }
    return finish(state.rejected.length > 0 ? "partial" : "synced");
  }

  /**
   * Reads the file as it is now. The claimed hash stays the one from the
   * tree, so a file edited since enumeration is rejected by the server and
   * picked up again next cycle.
   */
  private async prepare(rootDir: string, rel: RelativePath, leafHash: Digest, state: CycleState): Promise<PreparedFile> {
    try {
      const bytes = await fs.readFile(path.join(rootDir, ...rel.split("/")));
      return { payload: { path: rel, content: bytes.toString("base64"), claimedHash: leafHash }, bytes: bytes.length };
    } catch (err) {
      state.warnings.push(`could not read ${rel}: ${describeError(err)}`);
      return { payload: { path: rel, content: null, claimedHash: leafHash }, bytes: 0 };
    }
  }

  private pendingRetry(status: SyncCycleStatus, state: CycleState): RelativePath[] {
    const pending = new Set(state.rejected.map((r) => r.path));
    if (status === "degraded" || status === "failed" || status === "cancelled") {
      // nothing was committed, so the whole change set is still pending
      for (const p of [...state.changeSet.added, ...state.changeSet.modified, ...state.changeSet.removed]) {
        pending.add(p);
      }
    }
    return [...pending].sort();
  }

  private retry<T>(
    state: CycleState,
    signal: AbortSignal | undefined,
    call: (opts: { signal?: AbortSignal }) => Promise<T>
  ): Promise<T> {
    return withRetry(() => call({ signal }), this.retryPolicy, this.sleeper, {
      signal,
      onRetry: ({ attempt, delayMs, lastError }) => {
        state.retries += 1;
        this.logger.debug("retrying transport call", { attempt, delayMs, error: describeError(lastError) });
      },
    });
  }
}
