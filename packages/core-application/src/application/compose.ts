import path from "node:path";
import type { Hono } from "hono";

import type { Logger } from "../ports/logger";
import type { SyncClientConfig, SyncServerConfig } from "./config";
import { SyncServer } from "../services/sync-server";
import { SyncClient } from "../services/sync-client";
import { EmbeddingPipeline, EmbeddingUpserter } from "../services/embedding-pipeline";
import { EmbeddingSearch } from "../services/embedding-search";
import { ProjectWatchRegistry, type WatchConfig } from "../services/project-watch-registry";
import { NodeTreeSnapshotStore } from "../adapters/node-snapshot-store";
import { NodeEmbeddingStore } from "../adapters/node-embedding-store";
import { AesGcmVectorCipher, singleKeyRing } from "../adapters/aes-gcm-vector-cipher";
import { createEmbeddingProvider, type FetchLike } from "../adapters/http-embedding-providers";
import { HttpSyncTransport } from "../adapters/http-sync-transport";
import { ChokidarFileWatcher } from "../adapters/chokidar-file-watcher";
import { ConsoleLogger } from "../adapters/console-logger";
import { createSyncRoutes } from "../adapters/hono-sync-routes";

export type ServerRuntime = {
  server: SyncServer;
  app: Hono;
  search: EmbeddingSearch;
};

/** Wires the server role from its configuration. Listening on a port is left to the host. */
export function createServerRuntime(
  config: SyncServerConfig,
  options: { fetch?: FetchLike; logger?: Logger } = {}
): ServerRuntime {
  const logger = options.logger ?? new ConsoleLogger({ level: config.logLevel, scope: "server" });
  const dataDir = path.resolve(config.dataDir);

  const snapshots = new NodeTreeSnapshotStore(dataDir);
  const embeddings = new NodeEmbeddingStore(dataDir);
  const cipher = new AesGcmVectorCipher(
    singleKeyRing(config.encryption.keyId, Buffer.from(config.encryption.key, "base64"))
  );
  const provider = createEmbeddingProvider(config.embedding, options.fetch);

  const pipeline = new EmbeddingPipeline({
    provider,
    cipher,
    store: embeddings,
    logger: logger.child("embed"),
    maxChunkChars: config.maxChunkChars,
  });
  const server = new SyncServer({
    snapshots,
    embeddings,
    pipeline,
    upserter: new EmbeddingUpserter(embeddings),
    logger,
  });

  return {
    server,
    app: createSyncRoutes(server, logger),
    search: new EmbeddingSearch({ provider, store: embeddings, snapshots, cipher }),
  };
}

export type ClientRuntime = {
  client: SyncClient;
  transport: HttpSyncTransport;
  registry: ProjectWatchRegistry;
  /** The configured project, ready for `registry.start`. */
  watchConfig: WatchConfig;
};

export function createClientRuntime(
  config: SyncClientConfig,
  options: { fetch?: FetchLike; logger?: Logger } = {}
): ClientRuntime {
  const logger = options.logger ?? new ConsoleLogger({ level: config.logLevel, scope: "client" });
  const transport = new HttpSyncTransport({
    baseUrl: config.serverUrl,
    timeoutMs: config.requestTimeoutMs,
    fetch: options.fetch,
  });
  const client = new SyncClient({
    transport,
    logger,
    batchMaxBytes: config.batchMaxBytes,
    hashConcurrency: config.hashConcurrency,
  });
  const registry = new ProjectWatchRegistry({
    client,
    createWatcher: () => new ChokidarFileWatcher(),
    logger,
  });

  return {
    client,
    transport,
    registry,
    watchConfig: {
      projectId: config.projectId,
      rootDir: config.rootDir,
      debounceMs: config.debounceMs,
      pollIntervalMs: config.pollIntervalMs,
      watch: config.watch,
    },
  };
}
