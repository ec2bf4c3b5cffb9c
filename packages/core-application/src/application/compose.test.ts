import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createClientRuntime, createServerRuntime } from "./compose";
import { parseClientConfig, parseServerConfig } from "./config";
import { silentLogger } from "../adapters/console-logger";
import { makeTempDir, writeFiles } from "../testing/fakes";
import type { FetchLike } from "../adapters/http-embedding-providers";

describe("runtime composition", () => {
  let dataDir: string;
  let projectDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    projectDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  it("syncs a project into a server persisted on disk", async () => {
    const ollama: FetchLike = async () => new Response(JSON.stringify({ embeddings: [[0.5, 0.5]] }), { status: 200 });
    const server = createServerRuntime(
      parseServerConfig({ dataDir, encryption: { key: Buffer.alloc(32, 3).toString("base64") } }),
      { fetch: ollama, logger: silentLogger }
    );
    const client = createClientRuntime(
      parseClientConfig({ serverUrl: "http://sync.test", projectId: "demo", rootDir: projectDir, watch: false }),
      { fetch: async (input, init) => server.app.request(input, init), logger: silentLogger }
    );
    await writeFiles(projectDir, { "src/index.ts": "export const answer = 42;\n" });

    const summary = await client.client.runCycle({ projectId: "demo", rootDir: projectDir });
    const projects = await client.transport.listProjects();

    expect(summary.status).toBe("synced");
    expect(projects.projects.map((p) => [p.projectId, p.rootHash, p.fileCount])).toEqual([
      ["demo", summary.rootHash, 1],
    ]);
    expect(client.watchConfig).toEqual({
      projectId: "demo",
      rootDir: projectDir,
      debounceMs: 2000,
      pollIntervalMs: 0,
      watch: false,
    });

    const hits = await server.search.query("demo", "answer", 3);
    expect(hits).toHaveLength(1);
    expect(hits[0]?.paths).toEqual(["src/index.ts"]);
  });
});
