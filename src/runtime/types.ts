export type ExitNodeState = "starting" | "ready" | "in_use" | "quarantined" | "retiring" | "dead";

export interface Endpoint {
  host: string;
  port: number;
}

export const endpointUrl = (endpoint: Endpoint, scheme = "http"): string =>
  `${scheme}://${endpoint.host}:${endpoint.port}`;

/** Returned by a container runtime for one started identity. Only the pool holds it. */
export interface RuntimeHandle {
  id: string;
  proxy: Endpoint;
  control: Endpoint;
  startedAt: number;
}

export interface RuntimeStartConfig {
  name: string;
}

export type LeasePurpose = "job" | "probe";

export interface NodeLease {
  leaseId: string;
  nodeId: string;
  proxy: Endpoint;
  purpose: LeasePurpose;
  acquiredAt: number;
}

/** `cancelled` marks work the caller abandoned; it says nothing about the node. */
export type CheckinOutcome =
  | { ok: true; latencyMs?: number }
  | { ok: false; error: string; blocked?: boolean }
  | { ok: false; cancelled: true };

/** Read-only view of a node, the only shape that leaves the pool. */
export interface ExitNodeView {
  id: string;
  state: ExitNodeState;
  proxy: Endpoint | null;
  exitAddress: string | null;
  createdAt: number;
  lastRotatedAt: number;
  lastHealthyAt: number | null;
  lastCheckedOutAt: number | null;
  lastProbedAt: number | null;
  consecutiveFailures: number;
  quarantinedMs: number;
  successes: number;
  failures: number;
  blocked: number;
  rotations: number;
}

export interface PoolSnapshot {
  accepting: boolean;
  size: number;
  minSize: number;
  maxSize: number;
  waiters: number;
  growthCooldownUntil: string | null;
  runtimeReachable: boolean;
  counts: Record<ExitNodeState, number>;
  created: number;
  creationFailures: number;
  retired: number;
  nodes: ExitNodeView[];
}
