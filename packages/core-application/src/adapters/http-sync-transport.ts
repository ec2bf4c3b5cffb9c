import type { z } from "zod";

import type { SyncTransport, TransportCallOptions } from "../ports/sync-transport";
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  NegotiateResponseSchema,
  ProbeResponseSchema,
  ProjectsResponseSchema,
  PushChangesResponseSchema,
  PushRemovalsResponseSchema,
  type HealthResponse,
  type NegotiateRequest,
  type NegotiateResponse,
  type ProbeRequest,
  type ProbeResponse,
  type ProjectsResponse,
  type PushChangesRequest,
  type PushChangesResponse,
  type PushRemovalsRequest,
  type PushRemovalsResponse,
} from "../value-objects/wire";
import {
  EncryptionError,
  NoActiveSessionError,
  RemoteRateLimitedError,
  RemoteServerError,
  SyncProtocolError,
  TransientNetworkError,
  TreeIntegrityError,
  describeError,
} from "../application/errors";
import { withDeadline } from "../infra/deadline";
import type { FetchLike } from "./http-embedding-providers";

export type HttpSyncTransportOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  headers?: Record<string, string>;
};

function parseRetryAfter(value: string | null): number | undefined {
  if (value === null) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * fetch-based client for the sync routes. Maps HTTP outcomes onto the error
 * taxonomy so callers can decide what to retry; it never retries itself.
 */
export class HttpSyncTransport implements SyncTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpSyncTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  probe(request: ProbeRequest, options?: TransportCallOptions): Promise<ProbeResponse> {
    return this.call("POST", "/v1/sync/probe", ProbeResponseSchema, request, options);
  }

  negotiate(request: NegotiateRequest, options?: TransportCallOptions): Promise<NegotiateResponse> {
    return this.call("POST", "/v1/sync/negotiate", NegotiateResponseSchema, request, options);
  }

  pushChanges(request: PushChangesRequest, options?: TransportCallOptions): Promise<PushChangesResponse> {
    return this.call("POST", "/v1/sync/changes", PushChangesResponseSchema, request, options);
  }

  pushRemovals(request: PushRemovalsRequest, options?: TransportCallOptions): Promise<PushRemovalsResponse> {
    return this.call("POST", "/v1/sync/removals", PushRemovalsResponseSchema, request, options);
  }

  health(options?: TransportCallOptions): Promise<HealthResponse> {
    return this.call("GET", "/health", HealthResponseSchema, undefined, options);
  }

  listProjects(options?: TransportCallOptions): Promise<ProjectsResponse> {
    return this.call("GET", "/v1/projects", ProjectsResponseSchema, undefined, options);
  }

  private async call<T>(
    method: "GET" | "POST",
    route: string,
    schema: z.ZodType<T>,
    body: unknown,
    options: TransportCallOptions = {}
  ): Promise<T> {
    const deadline = withDeadline(this.timeoutMs, options.signal);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${route}`, {
        method,
        headers: { "Content-Type": "application/json", ...this.options.headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: deadline.signal,
      });
      text = await response.text();
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const what = deadline.timedOut() ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      throw new TransientNetworkError(`${method} ${route} failed: ${what}`, err);
    } finally {
      deadline.dispose();
    }

    let json: unknown = null;
    if (text !== "") {
      try {
        json = JSON.parse(text);
      } catch (err) {
        if (response.ok) throw new SyncProtocolError(`${route} returned invalid JSON`, response.status, err);
      }
    }

    if (!response.ok) throw this.toError(route, response, json, body);

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SyncProtocolError(`${route} returned an unexpected body: ${parsed.error.message}`, response.status);
    }
    return parsed.data;
  }

  private toError(route: string, response: Response, json: unknown, body: unknown): Error {
    const parsed = ErrorResponseSchema.safeParse(json);
    const code = parsed.success ? parsed.data.error : undefined;
    const message = parsed.success ? parsed.data.message : `${route} answered ${response.status}`;
    const status = response.status;

    if (code === "EncryptionError") return new EncryptionError(message);
    if (status === 409 || code === "NoActiveSessionError") {
      const projectId =
        typeof body === "object" && body !== null && "projectId" in body && typeof body.projectId === "string"
          ? body.projectId
          : "";
      return new NoActiveSessionError(projectId);
    }
    if (status === 422 || code === "TreeIntegrityError") return new TreeIntegrityError(message);
    if (status === 429) {
      return new RemoteRateLimitedError(message, parseRetryAfter(response.headers.get("retry-after")));
    }
    if (status >= 500) return new RemoteServerError(message, status);
    return new SyncProtocolError(message, status);
  }
}
