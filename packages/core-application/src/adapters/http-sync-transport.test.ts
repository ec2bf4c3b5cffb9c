import { describe, expect, it } from "vitest";

import { HttpSyncTransport } from "./http-sync-transport";
import type { FetchLike } from "./http-embedding-providers";
import {
  EncryptionError,
  NoActiveSessionError,
  RemoteRateLimitedError,
  RemoteServerError,
  SyncProtocolError,
  TransientNetworkError,
  TreeIntegrityError,
} from "../application/errors";

const HASH = "a".repeat(64);

function respond(status: number, body: unknown, headers: Record<string, string> = {}): FetchLike {
  return async () =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json", ...headers },
    });
}

function transport(fetch: FetchLike): HttpSyncTransport {
  return new HttpSyncTransport({ baseUrl: "http://sync.test/", fetch });
}

describe("HttpSyncTransport", () => {
  it("posts JSON to the route and parses the answer", async () => {
    const seen: { url: string; method?: string; body?: unknown }[] = [];
    const fetch: FetchLike = async (url, init) => {
      seen.push({ url, method: init?.method, body: init?.body });
      return new Response(JSON.stringify({ upToDate: true, acknowledgedRootHash: HASH }), { status: 200 });
    };

    const res = await transport(fetch).probe({ projectId: "p", rootHash: HASH });

    expect(res).toEqual({ upToDate: true, acknowledgedRootHash: HASH });
    expect(seen).toEqual([
      { url: "http://sync.test/v1/sync/probe", method: "POST", body: JSON.stringify({ projectId: "p", rootHash: HASH }) },
    ]);
  });

  it("maps 409 to NoActiveSessionError for the requested project", async () => {
    const err = await transport(respond(409, { error: "NoActiveSessionError", message: "gone" }))
      .pushRemovals({ projectId: "proj-1", paths: [] })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NoActiveSessionError);
    expect(err).toMatchObject({ projectId: "proj-1" });
  });

  it("maps 422 to TreeIntegrityError", async () => {
    const fetch = respond(422, { error: "TreeIntegrityError", message: "bad tree" });
    await expect(transport(fetch).probe({ projectId: "p", rootHash: HASH })).rejects.toBeInstanceOf(TreeIntegrityError);
  });

  it("maps 429 to RemoteRateLimitedError with retry-after", async () => {
    const fetch = respond(429, { error: "TooManyRequests", message: "slow down" }, { "retry-after": "7" });

    const err = await transport(fetch)
      .probe({ projectId: "p", rootHash: HASH })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteRateLimitedError);
    expect(err).toMatchObject({ retryAfterSeconds: 7, message: "slow down" });
  });

  it("maps an encryption failure ahead of the 500 status", async () => {
    const fetch = respond(500, { error: "EncryptionError", message: "no key" });
    await expect(transport(fetch).pushChanges({ projectId: "p", files: [] })).rejects.toBeInstanceOf(EncryptionError);
  });

  it("maps other 5xx to RemoteServerError", async () => {
    const err = await transport(respond(503, "unavailable"))
      .health()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteServerError);
    expect(err).toMatchObject({ statusCode: 503, message: "/health answered 503" });
  });

  it("maps other 4xx to SyncProtocolError", async () => {
    const fetch = respond(400, { error: "BadRequest", message: "files: Required" });
    await expect(transport(fetch).pushChanges({ projectId: "p", files: [] })).rejects.toBeInstanceOf(SyncProtocolError);
  });

  it("treats an unexpected success body as a protocol error", async () => {
    await expect(transport(respond(200, { upToDate: "yes" })).probe({ projectId: "p", rootHash: HASH })).rejects.toBeInstanceOf(
      SyncProtocolError
    );
  });

  it("wraps a failed fetch in TransientNetworkError", async () => {
    const fetch: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };

    const err = await transport(fetch)
      .listProjects()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientNetworkError);
    expect(err).toMatchObject({ message: "GET /v1/projects failed: TypeError: fetch failed" });
  });

  it("rethrows the abort when the caller cancels", async () => {
    const controller = new AbortController();
    const fetch: FetchLike = async (_url, init) => {
      controller.abort();
      init?.signal?.throwIfAborted();
      return new Response("{}");
    };

    const err = await transport(fetch)
      .health({ signal: controller.signal })
      .catch((e: unknown) => e);

    expect(err).not.toBeInstanceOf(TransientNetworkError);
    expect(err).toMatchObject({ name: "AbortError" });
  });
});
