import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ProjectWatchRegistry } from "./project-watch-registry";
import type { SyncProject } from "./sync-client";
import type { FileChangeEvent, FileWatcher, FileWatcherOptions } from "../ports/file-watcher";
import { cycleSummary, flushMicrotasks, makeTempDir } from "../testing/fakes";

class FakeWatcher implements FileWatcher {
  started: FileWatcherOptions | null = null;
  stopped = false;
  failOnStart = false;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.failOnStart) throw new Error("watch limit reached");
    this.started = options;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  onError(): void {}

  emit(rel: string): void {
    this.handler?.({ type: "modified", path: rel, occurredAt: new Date() });
  }
}

describe("ProjectWatchRegistry", () => {
  let root: string;
  let watchers: FakeWatcher[];
  let projects: SyncProject[];
  let registry: ProjectWatchRegistry;

  beforeEach(async () => {
    root = await makeTempDir();
    watchers = [];
    projects = [];
    vi.useFakeTimers();
    registry = new ProjectWatchRegistry({
      client: {
        runCycle: async (project) => {
          projects.push(project);
          return cycleSummary("synced", project.projectId);
        },
      },
      createWatcher: () => {
        const w = new FakeWatcher();
        watchers.push(w);
        return w;
      },
    });
  });

  afterEach(async () => {
    await registry.stopAll();
    vi.useRealTimers();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("runs a cycle for the project when its watcher reports a change", async () => {
    const handle = await registry.start({
      projectId: "alpha",
      rootDir: root,
      debounceMs: 200,
      pollIntervalMs: 0,
      watch: true,
      syncOnStart: false,
    });

    expect(watchers[0]?.started?.rootDir).toBe(path.resolve(root));
    expect(watchers[0]?.started?.ignore(path.join(root, ".git", "HEAD"))).toBe(true);
    expect(watchers[0]?.started?.ignore(path.join(root, "src", "main.ts"))).toBe(false);

    watchers[0]?.emit("src/main.ts");
    watchers[0]?.emit("src/util.ts");
    vi.advanceTimersByTime(200);
    await flushMicrotasks();

    expect(projects.map((p) => [p.projectId, p.rootDir])).toEqual([["alpha", path.resolve(root)]]);
    expect(handle.scheduler.completedCycles).toBe(1);
  });

  it("syncs on start unless told not to", async () => {
    await registry.start({ projectId: "alpha", rootDir: root, debounceMs: 50, pollIntervalMs: 0, watch: true });

    vi.advanceTimersByTime(50);
    await flushMicrotasks();

    expect(projects).toHaveLength(1);
  });

  it("polls on an interval without a watcher", async () => {
    await registry.start({
      projectId: "alpha",
      rootDir: root,
      debounceMs: 10,
      pollIntervalMs: 1000,
      watch: false,
      syncOnStart: false,
    });

    expect(watchers).toHaveLength(0);
    vi.advanceTimersByTime(1010);
    await flushMicrotasks();
    vi.advanceTimersByTime(1000);
    await flushMicrotasks();

    expect(projects).toHaveLength(2);
  });

  it("refuses to watch the same project twice", async () => {
    const config = { projectId: "alpha", rootDir: root, debounceMs: 10, pollIntervalMs: 0, watch: true, syncOnStart: false };
    await registry.start(config);

    await expect(registry.start(config)).rejects.toThrow("Project alpha is already being watched");
  });

  it("stop releases the watcher and the interval", async () => {
    const handle = await registry.start({
      projectId: "alpha",
      rootDir: root,
      debounceMs: 10,
      pollIntervalMs: 100,
      watch: true,
      syncOnStart: false,
    });

    await registry.stop(handle);
    vi.advanceTimersByTime(1000);
    await flushMicrotasks();

    expect(watchers[0]?.stopped).toBe(true);
    expect(registry.watchedProjects).toEqual([]);
    expect(projects).toHaveLength(0);
  });

  it("forgets the project when its watcher cannot start", async () => {
    const failing = new ProjectWatchRegistry({
      client: { runCycle: async (project) => cycleSummary("synced", project.projectId) },
      createWatcher: () => {
        const w = new FakeWatcher();
        w.failOnStart = true;
        return w;
      },
    });

    await expect(
      failing.start({ projectId: "beta", rootDir: root, debounceMs: 10, pollIntervalMs: 0, watch: true })
    ).rejects.toThrow("watch limit reached");
    expect(failing.watchedProjects).toEqual([]);
  });
});
