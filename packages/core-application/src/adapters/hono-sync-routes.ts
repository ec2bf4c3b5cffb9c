import { Hono, type Context } from "hono";
import type { z } from "zod";

import type { SyncServer } from "../services/sync-server";
import type { Logger } from "../ports/logger";
import {
  NegotiateRequestSchema,
  ProbeRequestSchema,
  PushChangesRequestSchema,
  PushRemovalsRequestSchema,
  type ErrorResponse,
} from "../value-objects/wire";
import { NoActiveSessionError, TreeIntegrityError } from "../application/errors";
import { silentLogger } from "./console-logger";

type JsonBody<T> = { ok: true; value: T } | { ok: false; response: Response };

async function readBody<T>(c: Context, schema: z.ZodType<T>): Promise<JsonBody<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    const error: ErrorResponse = { error: "BadRequest", message: "Invalid JSON body" };
    return { ok: false, response: c.json(error, 400) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; ");
    const error: ErrorResponse = { error: "BadRequest", message };
    return { ok: false, response: c.json(error, 400) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * HTTP surface of a SyncServer:
 *
 *   GET  /health
 *   GET  /v1/projects
 *   POST /v1/sync/probe
 *   POST /v1/sync/negotiate
 *   POST /v1/sync/changes
 *   POST /v1/sync/removals
 */
export function createSyncRoutes(server: SyncServer, logger: Logger = silentLogger): Hono {
  const app = new Hono();

  app.get("/health", async (c) => c.json(await server.health()));

  app.get("/v1/projects", async (c) => c.json(await server.listProjects()));

  app.post("/v1/sync/probe", async (c) => {
    const body = await readBody(c, ProbeRequestSchema);
    if (!body.ok) return body.response;
    return c.json(await server.probe(body.value));
  });

  app.post("/v1/sync/negotiate", async (c) => {
    const body = await readBody(c, NegotiateRequestSchema);
    if (!body.ok) return body.response;
    return c.json(await server.negotiate(body.value));
  });

  app.post("/v1/sync/changes", async (c) => {
    const body = await readBody(c, PushChangesRequestSchema);
    if (!body.ok) return body.response;
    return c.json(await server.pushChanges(body.value));
  });

  app.post("/v1/sync/removals", async (c) => {
    const body = await readBody(c, PushRemovalsRequestSchema);
    if (!body.ok) return body.response;
    return c.json(await server.pushRemovals(body.value));
  });

  app.notFound((c) => {
    const error: ErrorResponse = {
      error: "NotFound",
      message: `Route ${c.req.method} ${c.req.path} not found`,
    };
    return c.json(error, 404);
  });

  app.onError((err, c) => {
    const error: ErrorResponse = { error: err.name, message: err.message };
    if (err instanceof NoActiveSessionError) return c.json(error, 409);
    if (err instanceof TreeIntegrityError) return c.json(error, 422);

    logger.error("request failed", { method: c.req.method, path: c.req.path, error: err.message });
    return c.json(error, 500);
  });

  return app;
}
