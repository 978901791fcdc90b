import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { log } from "apify";
import { API_VERSION, OPERATION_ENDPOINTS } from "./api/contracts";
import { createErrorEnvelope, createSuccessEnvelope } from "./api/envelope";
import { createJobRequestValidator } from "./api/schema-validation";
import type { JobSubmission, SchedulerStats, ScrapeJob } from "./dispatch/types";
import type { MetricsRegistry } from "./observability/metrics";
import type { HealthMonitorStatus } from "./reliability/health-monitor";
import type { IncidentReporterSnapshot } from "./reliability/incident-reporter";
import { NotFoundError, ShuttingDownError, ValidationError, normalizeError } from "./runtime/errors";
import type { PoolSnapshot } from "./runtime/types";

export interface ServerRuntimeState {
  isShuttingDown: () => boolean;
  isAcceptingJobs: () => boolean;
  isRuntimeReachable: () => boolean;
  getPoolSnapshot: () => PoolSnapshot;
  getSchedulerStats: () => SchedulerStats;
  getMonitorStatus: () => HealthMonitorStatus;
  getIncidents: () => IncidentReporterSnapshot;
  submitJob: (submission: JobSubmission) => string;
  getJob: (jobId: string) => ScrapeJob | null;
}

export interface ApiServerOptions {
  requestBodyMaxBytes?: number;
}

const DEFAULT_BODY_MAX_BYTES = 64 * 1024;
const JOB_PATH = /^\/v1\/jobs\/([A-Za-z0-9_-]+)$/;

const json = (res: ServerResponse, statusCode: number, body: unknown): void => {
  res.statusCode = statusCode;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
};

const text = (res: ServerResponse, statusCode: number, body: string): void => {
  res.statusCode = statusCode;
  res.setHeader("content-type", "text/plain; version=0.0.4; charset=utf-8");
  res.end(body);
};

const iso = (ms: number | null): string | null => (ms === null ? null : new Date(ms).toISOString());

export const serializeJob = (job: ScrapeJob) => ({
  id: job.id,
  status: job.status,
  target_url: job.targetUrl,
  priority: job.priority,
  max_attempts: job.maxAttempts,
  attempt: job.attempt,
  assigned_node_id: job.assignedNodeId,
  submitted_at: iso(job.submittedAt),
  updated_at: iso(job.updatedAt),
  last_error: job.lastError,
  abandon_reason: job.abandonReason,
  metadata: job.metadata,
});

const readRawBody = async (req: IncomingMessage, maxBytes: number): Promise<string> => {
  const chunks: Buffer[] = [];
  let size = 0;

  await new Promise<void>((resolve, reject) => {
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        reject(new ValidationError("Request body exceeds max size.", { maxBytes }));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve());
    req.on("error", reject);
  });

  if (chunks.length === 0) throw new ValidationError("Request body is required.");
  return Buffer.concat(chunks).toString("utf8");
};

const readJsonBody = async (req: IncomingMessage, maxBytes: number): Promise<unknown> => {
  const raw = await readRawBody(req, maxBytes);
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new ValidationError("Request body must be valid JSON.");
  }
};

const notFound = (req: IncomingMessage): NotFoundError =>
  new NotFoundError(`Route not found: ${req.method ?? "GET"} ${req.url ?? "/"}`, {
    path: req.url ?? "/",
    method: req.method ?? "GET",
  });

/** Operations surface: health, readiness, pool and job views, metrics, incidents. */
export const createApiServer = (
  state: ServerRuntimeState,
  metrics: MetricsRegistry,
  options: ApiServerOptions = {},
): Server => {
  const startedAt = Date.now();
  const bodyMaxBytes = options.requestBodyMaxBytes ?? DEFAULT_BODY_MAX_BYTES;
  const validateJobRequest = createJobRequestValidator();

  const handle = async (req: IncomingMessage, res: ServerResponse, requestId: string): Promise<void> => {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (method === "GET" && path === "/v1") {
      json(res, 200, createSuccessEnvelope(requestId, { version: API_VERSION, endpoints: OPERATION_ENDPOINTS }));
      return;
    }

    if (method === "GET" && path === "/v1/health") {
      json(
        res,
        200,
        createSuccessEnvelope(requestId, {
          status: "ok",
          uptime_s: Math.floor((Date.now() - startedAt) / 1000),
        }),
      );
      return;
    }

    if (method === "GET" && path === "/v1/ready") {
      const accepting = !state.isShuttingDown() && state.isAcceptingJobs();
      const runtimeReachable = state.isRuntimeReachable();
      const pool = state.getPoolSnapshot();
      const scheduler = state.getSchedulerStats();
      json(
        res,
        accepting && runtimeReachable ? 200 : 503,
        createSuccessEnvelope(requestId, {
          ready: accepting && runtimeReachable,
          accepting,
          runtime_reachable: runtimeReachable,
          shutting_down: state.isShuttingDown(),
          pool_size: pool.size,
          ready_nodes: pool.counts.ready,
          queue_depth: scheduler.queued,
          dispatched: scheduler.dispatched,
        }),
      );
      return;
    }

    if (method === "GET" && path === "/v1/pool") {
      json(
        res,
        200,
        createSuccessEnvelope(requestId, {
          pool: state.getPoolSnapshot(),
          monitor: state.getMonitorStatus(),
        }),
      );
      return;
    }

    if (method === "GET" && path === "/v1/incidents") {
      json(res, 200, createSuccessEnvelope(requestId, state.getIncidents()));
      return;
    }

    if (method === "GET" && path === "/v1/metrics") {
      const scheduler = state.getSchedulerStats();
      metrics.set("scrape_queue_depth", {}, scheduler.queued);
      metrics.set("scrape_jobs_delayed", {}, scheduler.delayed);
      metrics.set("scrape_jobs_dispatched", {}, scheduler.dispatched);
      metrics.set("exit_pool_runtime_reachable", {}, state.isRuntimeReachable() ? 1 : 0);
      metrics.set("process_uptime_seconds", {}, Math.floor((Date.now() - startedAt) / 1000));
      metrics.set("build_info", { version: API_VERSION }, 1);
      text(res, 200, metrics.renderPrometheus());
      return;
    }

    if (method === "POST" && path === "/v1/jobs") {
      if (state.isShuttingDown()) throw new ShuttingDownError();
      const submission = validateJobRequest(await readJsonBody(req, bodyMaxBytes));
      const jobId = state.submitJob(submission);
      const job = state.getJob(jobId);
      json(res, 202, createSuccessEnvelope(requestId, { job_id: jobId, status: job?.status ?? "pending" }));
      return;
    }

    const jobMatch = method === "GET" ? JOB_PATH.exec(path) : null;
    if (jobMatch) {
      const job = state.getJob(jobMatch[1]);
      if (!job) throw new NotFoundError(`Job not found: ${jobMatch[1]}`, { job_id: jobMatch[1] });
      json(res, 200, createSuccessEnvelope(requestId, serializeJob(job)));
      return;
    }

    throw notFound(req);
  };

  return createServer((req, res) => {
    const requestId = `req_${randomUUID()}`;
    res.setHeader("x-request-id", requestId);

    const startedAtMs = Date.now();
    const method = req.method ?? "GET";
    const route = new URL(req.url ?? "/", "http://localhost").pathname.replace(JOB_PATH, "/v1/jobs/:id");

    res.on("finish", () => {
      metrics.inc("http_requests_total", { method, path: route, status: res.statusCode });
      metrics.observeMs("http_request_duration_ms", { method, path: route }, Date.now() - startedAtMs);
    });

    void handle(req, res, requestId).catch((error: unknown) => {
      const appError = normalizeError(error);
      if (appError.statusCode >= 500) {
        log.error("Operations request failed.", { method, path: route, error: appError.message });
      }
      res.setHeader("x-error-code", appError.code);
      json(res, appError.statusCode, createErrorEnvelope(requestId, appError, { path: route, method }));
    });
  });
};
