import type { Endpoint } from "../runtime/types";

export type JobStatus = "pending" | "dispatched" | "succeeded" | "failed" | "abandoned";

export interface JobSubmission {
  targetUrl: string;
  priority?: number;
  maxAttempts?: number;
  metadata?: Record<string, unknown>;
}

export interface ScrapeJob {
  id: string;
  targetUrl: string;
  priority: number;
  maxAttempts: number;
  attempt: number;
  status: JobStatus;
  /** Set only while `status === "dispatched"`. */
  assignedNodeId: string | null;
  submittedAt: number;
  updatedAt: number;
  lastError: string | null;
  abandonReason: string | null;
  metadata: Record<string, unknown>;
}

export interface ScrapeArtifact {
  url: string;
  finalUrl: string;
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  bodyBytes: number;
  fetchedAt: string;
  durationMs: number;
}

export interface ScrapeRequest {
  url: string;
  proxy: Endpoint;
  signal: AbortSignal;
  timeoutMs: number;
}

export interface SchedulerStats {
  accepting: boolean;
  running: boolean;
  workers: number;
  queued: number;
  delayed: number;
  dispatched: number;
  submitted: number;
  succeeded: number;
  abandoned: number;
  retried: number;
  requeuedExhausted: number;
}
