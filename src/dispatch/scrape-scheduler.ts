import { log } from "apify";
import { runWithJobContext, targetHostOf } from "../observability/job-context";
import type { MetricsRegistry } from "../observability/metrics";
import type { IncidentReporter } from "../reliability/incident-reporter";
import { classifyFailure, decideRetry, type BackoffConfig } from "../reliability/retry-policy";
import type { PolicySelector } from "../reliability/rotation-policy";
import {
  PoolExhaustedError,
  PoolShuttingDownError,
  RequestTimeoutError,
  ShuttingDownError,
  ValidationError,
  errorMessage,
} from "../runtime/errors";
import type { ExitNodePool } from "../runtime/exit-node-pool";
import type { CheckinOutcome, NodeLease } from "../runtime/types";
import { JobQueue } from "./job-queue";
import type { ResultSink } from "./result-sink";
import type { ScrapeTransport } from "./transport";
import type { JobStatus, JobSubmission, SchedulerStats, ScrapeArtifact, ScrapeJob } from "./types";

export interface ScrapeSchedulerConfig {
  workers: number;
  requestTimeoutMs: number;
  defaultMaxAttempts: number;
  backoff: BackoffConfig;
  exhaustedRequeueDelayMs: number;
  sinkHandoffTimeoutMs: number;
  jobRetention: number;
}

export interface ScrapeSchedulerDeps {
  pool: ExitNodePool;
  transport: ScrapeTransport;
  sink: ResultSink;
  policies?: PolicySelector;
  incidents?: IncidentReporter;
  metrics?: MetricsRegistry;
  random?: () => number;
}

interface Dispatch {
  controller: AbortController;
  done: Promise<void>;
}

const sleep = async (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const randomSuffix = (): string => Math.random().toString(36).slice(2, 8);

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

const copyJob = (job: ScrapeJob): ScrapeJob => ({ ...job, metadata: { ...job.metadata } });

/**
 * Job intake, dispatch, retry and backoff. Each job moves
 * `pending → dispatched → succeeded | pending (retry) | abandoned`, and
 * every dispatch returns its node through `checkin` on every exit path.
 */
export class ScrapeScheduler {
  private readonly config: ScrapeSchedulerConfig;
  private readonly pool: ExitNodePool;
  private readonly transport: ScrapeTransport;
  private readonly sink: ResultSink;
  private readonly policies: PolicySelector | null;
  private readonly incidents: IncidentReporter | null;
  private readonly metrics: MetricsRegistry | null;
  private readonly random: () => number;

  private readonly queue = new JobQueue();
  private readonly jobs = new Map<string, ScrapeJob>();
  private readonly finished: string[] = [];
  private readonly delayed = new Map<string, NodeJS.Timeout>();
  private readonly dispatching = new Map<string, Dispatch>();
  private readonly cancelled = new Set<string>();
  private idleResolvers: Array<() => void> = [];
  private workers: Array<Promise<void>> = [];
  private accepting = true;
  private running = false;
  private stopping: Promise<void> | null = null;
  private sequence = 0;
  private active = 0;
  private submitted = 0;
  private succeeded = 0;
  private abandoned = 0;
  private retried = 0;
  private requeuedExhausted = 0;

  public constructor(config: ScrapeSchedulerConfig, deps: ScrapeSchedulerDeps) {
    this.config = config;
    this.pool = deps.pool;
    this.transport = deps.transport;
    this.sink = deps.sink;
    this.policies = deps.policies ?? null;
    this.incidents = deps.incidents ?? null;
    this.metrics = deps.metrics ?? null;
    this.random = deps.random ?? Math.random;
  }

  public submit(submission: JobSubmission): string {
    if (!this.accepting) throw new ShuttingDownError();

    const targetUrl = submission.targetUrl.trim();
    if (!isHttpUrl(targetUrl)) {
      throw new ValidationError("`targetUrl` must be an absolute http(s) URL.", { targetUrl });
    }
    const priority = submission.priority ?? 0;
    if (!Number.isInteger(priority)) {
      throw new ValidationError("`priority` must be an integer.", { priority });
    }
    const maxAttempts = submission.maxAttempts ?? this.config.defaultMaxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ValidationError("`maxAttempts` must be a positive integer.", { maxAttempts });
    }

    const now = Date.now();
    const job: ScrapeJob = {
      id: `job_${++this.sequence}_${randomSuffix()}`,
      targetUrl,
      priority,
      maxAttempts,
      attempt: 0,
      status: "pending",
      assignedNodeId: null,
      submittedAt: now,
      updatedAt: now,
      lastError: null,
      abandonReason: null,
      metadata: { ...submission.metadata },
    };
    this.jobs.set(job.id, job);
    this.active += 1;
    this.submitted += 1;
    this.metrics?.inc("scrape_jobs_submitted_total");
    this.queue.push(job);
    log.debug("Job submitted.", { jobId: job.id, priority: job.priority, maxAttempts });
    return job.id;
  }

  public status(jobId: string): JobStatus | null {
    return this.jobs.get(jobId)?.status ?? null;
  }

  public get(jobId: string): ScrapeJob | null {
    const job = this.jobs.get(jobId);
    return job ? copyJob(job) : null;
  }

  public stats(): SchedulerStats {
    return {
      accepting: this.accepting,
      running: this.running,
      workers: this.workers.length,
      queued: this.queue.size,
      delayed: this.delayed.size,
      dispatched: this.dispatching.size,
      submitted: this.submitted,
      succeeded: this.succeeded,
      abandoned: this.abandoned,
      retried: this.retried,
      requeuedExhausted: this.requeuedExhausted,
    };
  }

  public isAccepting(): boolean {
    return this.accepting;
  }

  public start(): void {
    if (this.running || !this.accepting) return;
    this.running = true;
    const count = Math.max(1, this.config.workers);
    for (let index = 0; index < count; index += 1) {
      this.workers.push(this.workerLoop(index));
    }
    log.info("Scrape scheduler started.", { workers: count });
  }

  /** Resolves when no job is pending, waiting on a backoff timer or dispatched. */
  public async whenIdle(): Promise<void> {
    if (this.isIdle()) return;
    await new Promise<void>((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  /**
   * Stops intake, lets in-flight requests finish for up to `timeoutMs`, then
   * aborts them. Interrupted and queued jobs stay `pending`.
   */
  public async stop(timeoutMs: number): Promise<void> {
    if (this.stopping) return this.stopping;
    this.accepting = false;
    this.stopping = this.shutdown(timeoutMs);
    return this.stopping;
  }

  private async shutdown(timeoutMs: number): Promise<void> {
    this.queue.close();
    for (const timer of this.delayed.values()) clearTimeout(timer);
    this.delayed.clear();

    const inFlight = [...this.dispatching.values()].map((entry) => entry.done);
    if (inFlight.length > 0) {
      log.info("Waiting for in-flight scrape requests.", { count: inFlight.length, timeoutMs });
      await Promise.race([Promise.all(inFlight), sleep(timeoutMs)]);
    }

    for (const [jobId, entry] of this.dispatching) {
      this.cancelled.add(jobId);
      entry.controller.abort(new ShuttingDownError());
    }
    await Promise.all([...this.dispatching.values()].map((entry) => entry.done));

    this.running = false;
    this.checkIdle();
    log.info("Scrape scheduler stopped.", {
      pending: this.active,
      succeeded: this.succeeded,
      abandoned: this.abandoned,
    });
  }

  private async workerLoop(index: number): Promise<void> {
    for (;;) {
      const job = await this.queue.take();
      if (!job) return;
      try {
        await this.dispatch(job);
      } catch (error) {
        log.error("Dispatch worker failed on a job.", {
          worker: index,
          jobId: job.id,
          error: errorMessage(error),
        });
        this.transition(job, "pending");
        this.schedule(job, this.config.exhaustedRequeueDelayMs);
      }
    }
  }

  private async dispatch(job: ScrapeJob): Promise<void> {
    let lease: NodeLease;
    try {
      lease = await this.pool.checkout();
    } catch (error) {
      if (error instanceof PoolExhaustedError) {
        this.requeuedExhausted += 1;
        this.metrics?.inc("scrape_jobs_requeued_total", { reason: "pool_exhausted" });
        log.debug("No exit node available; job requeued.", {
          jobId: job.id,
          delayMs: this.config.exhaustedRequeueDelayMs,
        });
        this.schedule(job, this.config.exhaustedRequeueDelayMs);
        return;
      }
      if (error instanceof PoolShuttingDownError) {
        this.leavePending(job);
        return;
      }
      throw error;
    }

    if (!this.accepting) {
      this.pool.checkin(lease.nodeId, { ok: false, cancelled: true });
      this.leavePending(job);
      return;
    }

    const controller = new AbortController();
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.dispatching.set(job.id, { controller, done });
    this.transition(job, "dispatched");
    job.assignedNodeId = lease.nodeId;

    let artifact: ScrapeArtifact | null = null;
    let failure: unknown = null;
    const started = Date.now();
    try {
      artifact = await runWithJobContext(
        {
          job_id: job.id,
          node_id: lease.nodeId,
          attempt: job.attempt + 1,
          target_host: targetHostOf(job.targetUrl),
        },
        async () => this.request(job, lease, controller),
      );
    } catch (error) {
      failure = error;
    } finally {
      this.pool.checkin(
        lease.nodeId,
        this.outcomeOf(artifact, failure, this.cancelled.has(job.id)),
        this.policies?.forTarget(job.targetUrl),
      );
      job.assignedNodeId = null;
      this.dispatching.delete(job.id);
      release();
    }

    this.metrics?.observeMs(
      "scrape_request_duration_ms",
      { outcome: artifact ? "success" : classifyFailure(failure) },
      Date.now() - started,
    );

    if (this.cancelled.delete(job.id)) {
      this.leavePending(job);
      return;
    }

    if (artifact) {
      await this.complete(job, artifact);
      return;
    }
    await this.fail(job, failure);
  }

  private async request(job: ScrapeJob, lease: NodeLease, controller: AbortController): Promise<ScrapeArtifact> {
    const timeoutMs = this.config.requestTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new RequestTimeoutError(timeoutMs, { url: job.targetUrl }));
    }, timeoutMs);
    const interrupted = new Promise<never>((_, reject) => {
      const onAbort = (): void => {
        reject(controller.signal.reason);
      };
      if (controller.signal.aborted) onAbort();
      else controller.signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      return await Promise.race([
        this.transport.fetch({
          url: job.targetUrl,
          proxy: lease.proxy,
          signal: controller.signal,
          timeoutMs,
        }),
        interrupted,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private outcomeOf(artifact: ScrapeArtifact | null, failure: unknown, cancelled: boolean): CheckinOutcome {
    if (artifact) return { ok: true, latencyMs: artifact.durationMs };
    if (cancelled) return { ok: false, cancelled: true };
    return {
      ok: false,
      error: errorMessage(failure),
      blocked: classifyFailure(failure) === "blocked",
    };
  }

  private async complete(job: ScrapeJob, artifact: ScrapeArtifact): Promise<void> {
    this.transition(job, "succeeded");
    job.lastError = null;
    this.succeeded += 1;
    this.metrics?.inc("scrape_jobs_finished_total", { status: "succeeded" });
    log.info("Job succeeded.", {
      jobId: job.id,
      statusCode: artifact.statusCode,
      attempts: job.attempt + 1,
      durationMs: artifact.durationMs,
    });
    this.retire(job);
    await this.handOff(job, "succeeded", async () => this.sink.onSucceeded(job.id, artifact, copyJob(job)));
  }

  private async fail(job: ScrapeJob, failure: unknown): Promise<void> {
    job.attempt += 1;
    const message = errorMessage(failure);
    const decision = decideRetry(this.config.backoff, failure, job.attempt, job.maxAttempts, this.random);
    job.lastError = `${decision.category}: ${message}`;

    if (decision.retry) {
      this.retried += 1;
      this.metrics?.inc("scrape_jobs_retried_total", { category: decision.category });
      log.info("Job attempt failed; retry scheduled.", {
        jobId: job.id,
        attempt: job.attempt,
        maxAttempts: job.maxAttempts,
        category: decision.category,
        delayMs: decision.delayMs,
        error: message,
      });
      this.transition(job, "pending");
      this.schedule(job, decision.delayMs);
      return;
    }

    const reason = job.lastError;
    this.transition(job, "abandoned");
    job.abandonReason = reason;
    this.abandoned += 1;
    this.metrics?.inc("scrape_jobs_finished_total", { status: "abandoned" });
    log.warning("Job abandoned.", { jobId: job.id, attempts: job.attempt, reason });
    void this.incidents?.report({
      level: "warning",
      kind: "job_abandoned",
      subject: job.id,
      message: reason,
      details: { targetUrl: job.targetUrl, attempts: job.attempt },
    });
    this.retire(job);
    await this.handOff(job, "abandoned", async () => this.sink.onAbandoned(job.id, reason, copyJob(job)));
  }

  /** Puts a pending job back on the queue, now or after `delayMs`. */
  private schedule(job: ScrapeJob, delayMs: number): void {
    if (!this.accepting) {
      this.leavePending(job);
      return;
    }
    if (delayMs <= 0) {
      this.queue.push(job);
      return;
    }
    const timer = setTimeout(() => {
      this.delayed.delete(job.id);
      if (!this.queue.push(job)) this.leavePending(job);
    }, delayMs);
    this.delayed.set(job.id, timer);
  }

  private leavePending(job: ScrapeJob): void {
    job.assignedNodeId = null;
    if (job.status !== "pending") this.transition(job, "pending");
    if (!this.accepting) {
      log.debug("Job left pending by shutdown.", { jobId: job.id });
      this.checkIdle();
    }
  }

  private transition(job: ScrapeJob, status: JobStatus): void {
    job.status = status;
    job.updatedAt = Date.now();
  }

  /** Finished jobs count toward retention; the oldest are evicted first. */
  private retire(job: ScrapeJob): void {
    this.active -= 1;
    this.finished.push(job.id);
    while (this.finished.length > this.config.jobRetention) {
      const evicted = this.finished.shift();
      if (evicted) this.jobs.delete(evicted);
    }
    this.checkIdle();
  }

  /** After shutdown the jobs left `pending` no longer count. */
  private isIdle(): boolean {
    return this.active === 0 || (!this.accepting && this.delayed.size === 0 && this.dispatching.size === 0);
  }

  private checkIdle(): void {
    if (!this.isIdle() || this.idleResolvers.length === 0) return;
    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    for (const resolve of resolvers) resolve();
  }

  private async handOff(job: ScrapeJob, kind: "succeeded" | "abandoned", notify: () => Promise<void>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.config.sinkHandoffTimeoutMs);
    });

    try {
      const result = await Promise.race([notify().then(() => "delivered" as const), timeout]);
      if (result === "timeout") {
        log.warning("Result sink did not acknowledge in time.", {
          jobId: job.id,
          kind,
          timeoutMs: this.config.sinkHandoffTimeoutMs,
        });
      }
    } catch (error) {
      log.error("Result sink rejected a job outcome.", {
        jobId: job.id,
        kind,
        error: errorMessage(error),
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
