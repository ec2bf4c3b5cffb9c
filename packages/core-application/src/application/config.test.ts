import { describe, expect, it } from "vitest";

import { loadClientConfigFromEnv, loadServerConfigFromEnv, parseServerConfig } from "./config";
import { ConfigError } from "./errors";

const KEY = Buffer.alloc(32, 1).toString("base64");

describe("client config", () => {
  it("fills defaults around the required fields", () => {
    const config = loadClientConfigFromEnv({ CODE_SYNC_PROJECT_ID: "alpha", CODE_SYNC_ROOT_DIR: "/work/alpha" });

    expect(config).toEqual({
      serverUrl: "http://localhost:8000",
      projectId: "alpha",
      rootDir: "/work/alpha",
      debounceMs: 2000,
      pollIntervalMs: 0,
      watch: true,
      requestTimeoutMs: 10_000,
      batchMaxBytes: 4 * 1024 * 1024,
      hashConcurrency: 8,
      logLevel: "info",
    });
  });

  it("coerces numbers and flags from the environment", () => {
    const config = loadClientConfigFromEnv({
      CODE_SYNC_PROJECT_ID: "alpha",
      CODE_SYNC_ROOT_DIR: "/work/alpha",
      CODE_SYNC_DEBOUNCE_MS: "250",
      CODE_SYNC_POLL_INTERVAL_MS: "60000",
      CODE_SYNC_WATCH: "off",
      CODE_SYNC_LOG_LEVEL: "debug",
      CODE_SYNC_SERVER_URL: "  ",
    });

    expect(config).toMatchObject({
      serverUrl: "http://localhost:8000",
      debounceMs: 250,
      pollIntervalMs: 60000,
      watch: false,
      logLevel: "debug",
    });
  });

  it("lists every problem in one ConfigError", () => {
    let caught: unknown;
    try {
      loadClientConfigFromEnv({ CODE_SYNC_DEBOUNCE_MS: "-5" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: ["projectId: Required", "rootDir: Required", "debounceMs: Number must be greater than or equal to 0"],
    });
  });
});

describe("server config", () => {
  it("reads the embedding and encryption settings", () => {
    const config = loadServerConfigFromEnv({
      CODE_SYNC_PORT: "9000",
      CODE_SYNC_EMBEDDING_PROVIDER: "openai-compatible",
      CODE_SYNC_EMBEDDING_URL: "http://embeddings.test/v1",
      CODE_SYNC_EMBEDDING_API_KEY: "test-secret",
      CODE_SYNC_ENCRYPTION_KEY: KEY,
    });

    expect(config.port).toBe(9000);
    expect(config.dataDir).toBe(".code-sync");
    expect(config.embedding).toEqual({
      kind: "openai-compatible",
      baseUrl: "http://embeddings.test/v1",
      model: "nomic-embed-text",
      apiKey: "test-secret",
      timeoutMs: 30_000,
    });
    expect(config.encryption).toEqual({ keyId: "k1", key: KEY });
  });

  it("requires a 32 byte encryption key", () => {
    expect(() => loadServerConfigFromEnv({})).toThrow("encryption.key: Required");
    expect(() => parseServerConfig({ encryption: { key: Buffer.alloc(16).toString("base64") } })).toThrow(
      "encryption.key: encryption key must decode to 32 bytes"
    );
  });
});
