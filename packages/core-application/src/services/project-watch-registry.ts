import path from "node:path";

import type { ProjectId } from "@code-sync/core-domain";
import type { FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { systemClock, type Clock, type IntervalHandle } from "../ports/clock";
import type { SyncCycleSummary } from "../value-objects/cycle-summary";

import type { SyncClient } from "./sync-client";
import { SyncScheduler } from "./sync-scheduler";
import type { IgnorePredicate } from "./file-enumerator";
import { loadSyncIgnore, toAbsoluteIgnore } from "../adapters/sync-ignore";
import { silentLogger } from "../adapters/console-logger";
import { describeError } from "../application/errors";

export type WatchConfig = {
  projectId: ProjectId;
  rootDir: string;
  debounceMs: number;
  /** 0 disables the periodic trigger. */
  pollIntervalMs: number;
  /** Filesystem notifications; off means timer and manual triggers only. */
  watch: boolean;
  /** Run one cycle right after start. */
  syncOnStart?: boolean;
};

export type WatchHandle = {
  readonly projectId: ProjectId;
  readonly rootDir: string;
  readonly scheduler: SyncScheduler;
  /** Schedules a cycle as if a file had changed. */
  syncNow(): void;
};

type Entry = {
  handle: WatchHandle;
  watcher: FileWatcher | null;
  interval: IntervalHandle | null;
};

export type ProjectWatchRegistryDeps = {
  client: Pick<SyncClient, "runCycle">;
  createWatcher: () => FileWatcher;
  clock?: Clock;
  logger?: Logger;
  onCycle?: (summary: SyncCycleSummary) => void;
};

/**
 * Owns every watched project of the process. One scheduler per project,
 * fed by its file watcher and interval timer. Nothing here is global: the
 * registry is created and passed around explicitly.
 */
export class ProjectWatchRegistry {
  private readonly entries = new Map<ProjectId, Entry>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: ProjectWatchRegistryDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  get watchedProjects(): ProjectId[] {
    return [...this.entries.keys()].sort();
  }

  get(projectId: ProjectId): WatchHandle | undefined {
    return this.entries.get(projectId)?.handle;
  }

  async start(config: WatchConfig): Promise<WatchHandle> {
    if (this.entries.has(config.projectId)) {
      throw new Error(`Project ${config.projectId} is already being watched`);
    }

    const rootDir = path.resolve(config.rootDir);
    const log = this.logger.child(config.projectId);
    const ignore: IgnorePredicate = await loadSyncIgnore(rootDir);

    const scheduler = new SyncScheduler({
      debounceMs: config.debounceMs,
      clock: this.clock,
      logger: log,
      onCycle: this.deps.onCycle,
      runCycle: (signal) => this.deps.client.runCycle({ projectId: config.projectId, rootDir, ignore }, signal),
    });

    const handle: WatchHandle = {
      projectId: config.projectId,
      rootDir,
      scheduler,
      syncNow: () => scheduler.trigger("manual"),
    };
    const entry: Entry = { handle, watcher: null, interval: null };
    this.entries.set(config.projectId, entry);

    try {
      if (config.watch) {
        const watcher = this.deps.createWatcher();
        watcher.onEvent((event) => {
          log.debug("file event", { type: event.type, path: event.path });
          scheduler.trigger("filesystem");
        });
        watcher.onError((err) => log.warn("watcher error", { error: describeError(err) }));
        entry.watcher = watcher;
        await watcher.start({ rootDir, ignore: toAbsoluteIgnore(rootDir, ignore) });
      }
    } catch (err) {
      await this.stop(handle);
      throw err;
    }

    if (config.pollIntervalMs > 0) {
      entry.interval = this.clock.setInterval(() => scheduler.trigger("timer"), config.pollIntervalMs);
    }
    if (config.syncOnStart ?? true) scheduler.trigger("startup");

    log.info("watching", { rootDir, watch: config.watch, pollIntervalMs: config.pollIntervalMs });
    return handle;
  }

  async stop(handle: WatchHandle): Promise<void> {
    const entry = this.entries.get(handle.projectId);
    if (!entry || entry.handle !== handle) return;
    this.entries.delete(handle.projectId);

    if (entry.interval !== null) this.clock.clearInterval(entry.interval);
    await entry.watcher?.stop();
    await entry.handle.scheduler.stop();
    this.logger.info("stopped watching", { projectId: handle.projectId });
  }

  async stopAll(): Promise<void> {
    const handles = [...this.entries.values()].map((e) => e.handle);
    await Promise.all(handles.map((h) => this.stop(h)));
  }
}
