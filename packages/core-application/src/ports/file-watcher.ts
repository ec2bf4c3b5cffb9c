export type FileChangeType = "created" | "modified" | "deleted";

export type FileChangeEvent = {
  type: FileChangeType;
  /** Relative to the watched root, POSIX separators. */
  path: string;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  /** Called with absolute paths; true keeps the path out of the watch. */
  ignore: (absPath: string) => boolean;
};

/** Change notifications for one project root. Only used as a trigger source. */
export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
  onError(handler: (err: unknown) => void): void;
}
