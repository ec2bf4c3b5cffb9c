import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";

import type { FileChangeEvent, FileChangeType, FileWatcher, FileWatcherOptions } from "../ports/file-watcher";
import { toPosix } from "../services/digest";

type Listener<T> = ((value: T) => void) | null;

/**
 * chokidar behind the FileWatcher port. Events only say that something under
 * the root moved; the next cycle rebuilds the tree, so adds and removals of
 * directories are reported like files and nothing is buffered here.
 */
export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private onChange: Listener<FileChangeEvent> = null;
  private onFailure: Listener<unknown> = null;

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.onChange = handler;
  }

  onError(handler: (err: unknown) => void): void {
    this.onFailure = handler;
  }

  async start({ rootDir, ignore }: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;
    const root = path.resolve(rootDir);

    const watcher = chokidar.watch(root, {
      persistent: true,
      ignoreInitial: true,
      followSymlinks: false,
      // editors write in several steps; wait for the file to settle
      awaitWriteFinish: { stabilityThreshold: 250, pollInterval: 50 },
      ignored: (p: string) => ignore(path.resolve(p)),
    });
    this.watcher = watcher;

    const report = (type: FileChangeType) => (absPath: string) => {
      this.onChange?.({ type, path: toPosix(path.relative(root, absPath)), occurredAt: new Date() });
    };

    watcher
      .on("add", report("created"))
      .on("addDir", (p: string) => {
        if (path.resolve(p) !== root) report("created")(p);
      })
      .on("change", report("modified"))
      .on("unlink", report("deleted"))
      .on("unlinkDir", report("deleted"))
      .on("error", (err: unknown) => this.onFailure?.(err));

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
  }
}
