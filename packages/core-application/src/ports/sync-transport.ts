import type {
  HealthResponse,
  NegotiateRequest,
  NegotiateResponse,
  ProbeRequest,
  ProbeResponse,
  ProjectsResponse,
  PushChangesRequest,
  PushChangesResponse,
  PushRemovalsRequest,
  PushRemovalsResponse,
} from "../value-objects/wire";

export type TransportCallOptions = {
  signal?: AbortSignal;
};

/** Client-side view of the sync protocol; HTTP or anything equivalent. */
export interface SyncTransport {
  probe(request: ProbeRequest, options?: TransportCallOptions): Promise<ProbeResponse>;
  negotiate(request: NegotiateRequest, options?: TransportCallOptions): Promise<NegotiateResponse>;
  pushChanges(request: PushChangesRequest, options?: TransportCallOptions): Promise<PushChangesResponse>;
  pushRemovals(request: PushRemovalsRequest, options?: TransportCallOptions): Promise<PushRemovalsResponse>;
  health(options?: TransportCallOptions): Promise<HealthResponse>;
  listProjects(options?: TransportCallOptions): Promise<ProjectsResponse>;
}
