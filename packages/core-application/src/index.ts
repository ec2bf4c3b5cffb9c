// Public API of the core-application package: ports, protocol services,
// Node adapters and the application layer (errors, retry, config).

// Ports
export * from "./ports/clock";
export * from "./ports/logger";
export * from "./ports/retry-policy";
export * from "./ports/snapshot-store";
export * from "./ports/embedding-provider";
export * from "./ports/embedding-store";
export * from "./ports/vector-cipher";
export * from "./ports/sync-transport";
export type { ContentHasher } from "./ports/content-hasher";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Value objects
export * from "./value-objects/wire";
export * from "./value-objects/cycle-summary";

// Services
export * from "./services/digest";
export * from "./services/file-enumerator";
export * from "./services/merkle-tree-builder";
export * from "./services/tree-index";
export * from "./services/tree-serialization";
export * from "./services/tree-differ";
export * from "./services/chunker";
export * from "./services/embedding-pipeline";
export * from "./services/embedding-search";
export * from "./services/sync-server";
export * from "./services/sync-client";
export * from "./services/sync-scheduler";
export * from "./services/project-watch-registry";

// Application layer
export * from "./application/errors";
export * from "./application/with-retry";
export * from "./application/default-network-retry-policy";
export * from "./application/config";
export * from "./application/compose";
export { sleep } from "./infra/sleep";

// Node adapters
export * from "./adapters/node-content-hasher";
export * from "./adapters/node-snapshot-store";
export * from "./adapters/memory-snapshot-store";
export * from "./adapters/node-embedding-store";
export * from "./adapters/memory-embedding-store";
export * from "./adapters/aes-gcm-vector-cipher";
export * from "./adapters/http-embedding-providers";
export * from "./adapters/http-sync-transport";
export * from "./adapters/hono-sync-routes";
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/sync-ignore";
export * from "./adapters/console-logger";
