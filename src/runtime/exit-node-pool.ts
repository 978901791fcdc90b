import { log } from "apify";
import type { MetricsRegistry } from "../observability/metrics";
import type { IncidentReporter } from "../reliability/incident-reporter";
import type { NodeProber, ProbeResult } from "../reliability/node-prober";
import type { RotationPolicy, RotationSubject } from "../reliability/rotation-policy";
import type { CircuitRuntime } from "./circuit-runtime";
import {
  NodeCreationFailedError,
  PoolExhaustedError,
  PoolShuttingDownError,
  RuntimeUnavailableError,
  errorMessage,
} from "./errors";
import type {
  CheckinOutcome,
  Endpoint,
  ExitNodeState,
  ExitNodeView,
  LeasePurpose,
  NodeLease,
  PoolSnapshot,
  RuntimeHandle,
} from "./types";

export interface ExitNodePoolConfig {
  minSize: number;
  maxSize: number;
  checkoutTimeoutMs: number;
  creationCooldownMs: number;
  startupProbeAttempts: number;
  startupProbeIntervalMs: number;
  runtimeUnreachableThreshold: number;
}

export interface ExitNodePoolDeps {
  runtime: CircuitRuntime;
  prober: NodeProber;
  policy: RotationPolicy;
  incidents?: IncidentReporter;
  metrics?: MetricsRegistry;
  /** Called once a node's proxy endpoint stops existing. */
  releaseProxy?: (proxy: Endpoint) => Promise<void>;
}

type RestorableState = "ready" | "quarantined";

interface ActiveLease {
  leaseId: string;
  purpose: LeasePurpose;
  acquiredAt: number;
  restoreState: RestorableState;
}

interface ExitNodeRecord {
  id: string;
  seq: number;
  handle: RuntimeHandle | null;
  state: ExitNodeState;
  exitAddress: string | null;
  createdAt: number;
  lastRotatedAt: number;
  lastHealthyAt: number | null;
  lastCheckedOutAt: number | null;
  lastProbedAt: number | null;
  /** Monotonic use marker for LRU selection; a fresh identity counts as a use. */
  useTick: number;
  consecutiveFailures: number;
  quarantinedAt: number | null;
  quarantineTotalMs: number;
  successes: number;
  failures: number;
  blocked: number;
  rotations: number;
  lease: ActiveLease | null;
  retireRequested: boolean;
  teardown: Promise<void> | null;
}

interface Waiter {
  enqueuedAt: number;
  resolve: (lease: NodeLease) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const sleep = async (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const randomSuffix = (): string => Math.random().toString(36).slice(2, 8);

const STATES: ExitNodeState[] = ["starting", "ready", "in_use", "quarantined", "retiring", "dead"];

/**
 * Single owner of every exit node. All structural changes happen
 * synchronously before the first await of each operation, so the event loop
 * serializes them and nothing is double-lent, double-created or
 * double-destroyed.
 */
export class ExitNodePool {
  private readonly config: ExitNodePoolConfig;
  private readonly runtime: CircuitRuntime;
  private readonly prober: NodeProber;
  private readonly policy: RotationPolicy;
  private readonly incidents: IncidentReporter | null;
  private readonly metrics: MetricsRegistry | null;
  private readonly releaseProxy: ((proxy: Endpoint) => Promise<void>) | null;

  private readonly nodes = new Map<string, ExitNodeRecord>();
  private readonly bringUps = new Map<string, Promise<void>>();
  private readonly waiters: Waiter[] = [];
  private readonly changeListeners = new Set<() => void>();

  private accepting = true;
  private draining: Promise<void> | null = null;
  private sequence = 0;
  private leaseSequence = 0;
  private useSequence = 0;
  private growthCooldownUntil = 0;
  private unavailableStreak = 0;
  private runtimeReachable = true;
  private created = 0;
  private creationFailures = 0;
  private retired = 0;

  public constructor(config: ExitNodePoolConfig, deps: ExitNodePoolDeps) {
    this.config = config;
    this.runtime = deps.runtime;
    this.prober = deps.prober;
    this.policy = deps.policy;
    this.incidents = deps.incidents ?? null;
    this.metrics = deps.metrics ?? null;
    this.releaseProxy = deps.releaseProxy ?? null;
  }

  /** Grows toward the minimum size and waits for those first nodes to settle. */
  public async start(): Promise<void> {
    this.replenish();
    await this.settled();
    log.info("Exit node pool started.", {
      ready: this.count("ready"),
      minSize: this.config.minSize,
      maxSize: this.config.maxSize,
    });
  }

  /** Resolves once no node is being created or torn down. */
  public async settled(): Promise<void> {
    for (;;) {
      const pending = [
        ...this.bringUps.values(),
        ...[...this.nodes.values()].flatMap((node) => (node.teardown ? [node.teardown] : [])),
      ];
      if (pending.length === 0) return;
      await Promise.all(pending);
    }
  }

  public ensureMinimum(): void {
    this.replenish();
  }

  public isAccepting(): boolean {
    return this.accepting;
  }

  public isRuntimeReachable(): boolean {
    return this.runtimeReachable;
  }

  public async checkout(): Promise<NodeLease> {
    if (!this.accepting) throw new PoolShuttingDownError();

    const node = this.pickReady();
    if (node) {
      this.metrics?.observeMs("exit_pool_checkout_wait_ms", {}, 0);
      return this.lend(node, "job");
    }

    return new Promise<NodeLease>((resolve, reject) => {
      const waiter: Waiter = {
        enqueuedAt: Date.now(),
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          this.metrics?.inc("exit_pool_exhausted_total");
          reject(
            new PoolExhaustedError({
              timeoutMs: this.config.checkoutTimeoutMs,
              size: this.nodes.size,
              maxSize: this.config.maxSize,
            }),
          );
        }, this.config.checkoutTimeoutMs),
      };
      this.waiters.push(waiter);
      this.replenish();
    });
  }

  /**
   * Returns a job lease. Always clears `in_use`: the node goes back to
   * `ready`, into quarantine, or into retirement.
   */
  public checkin(nodeId: string, outcome: CheckinOutcome, policy: RotationPolicy = this.policy): void {
    const node = this.nodes.get(nodeId);
    if (!node || node.state !== "in_use" || node.lease?.purpose !== "job") {
      log.warning("Ignoring checkin for a node that is not lent to a job.", {
        nodeId,
        state: node?.state ?? "unknown",
      });
      return;
    }

    const now = Date.now();
    node.lease = null;
    if ("cancelled" in outcome) {
      this.metrics?.inc("exit_pool_checkins_total", { outcome: "cancelled" });
      if (node.retireRequested) void this.beginRetire(node, "requested");
      else this.makeAvailable(node);
      return;
    }

    if (outcome.ok) {
      node.successes += 1;
      node.consecutiveFailures = 0;
      node.lastHealthyAt = now;
    } else {
      node.failures += 1;
      node.consecutiveFailures += 1;
      if (outcome.blocked) node.blocked += 1;
    }
    this.metrics?.inc("exit_pool_checkins_total", { outcome: outcome.ok ? "success" : "failure" });

    if (node.retireRequested) {
      void this.beginRetire(node, "requested");
      return;
    }

    if (!outcome.ok) {
      const subject = this.subjectOf(node, now);
      if (policy.shouldRetire(subject, now)) {
        void this.beginRetire(node, "failures");
        return;
      }
      if (policy.shouldQuarantine(subject)) {
        this.quarantine(node, now, outcome.error);
        this.notify();
        return;
      }
    }

    this.makeAvailable(node);
  }

  /** Probe lease on a `ready` or `quarantined` node; null when the node is not eligible. */
  public acquireProbe(nodeId: string): NodeLease | null {
    if (!this.accepting) return null;
    const node = this.nodes.get(nodeId);
    if (!node || (node.state !== "ready" && node.state !== "quarantined")) return null;
    return this.lend(node, "probe");
  }

  public recordProbe(
    lease: NodeLease,
    result: ProbeResult,
    policy: RotationPolicy = this.policy,
  ): ExitNodeView | null {
    const node = this.leased(lease);
    if (!node?.lease) return null;

    const now = Date.now();
    node.lastProbedAt = now;
    this.metrics?.inc("exit_pool_probes_total", { result: result.healthy ? "healthy" : "unhealthy" });

    if (result.healthy) {
      node.consecutiveFailures = 0;
      node.lastHealthyAt = now;
      if (result.exitAddress) node.exitAddress = result.exitAddress;
      if (node.lease.restoreState === "quarantined") {
        this.endQuarantine(node, now);
        node.lease.restoreState = "ready";
        log.info("Exit node restored from quarantine.", { nodeId: node.id });
      }
      return this.toView(node, now);
    }

    node.failures += 1;
    node.consecutiveFailures += 1;
    if (node.lease.restoreState === "ready" && policy.shouldQuarantine(this.subjectOf(node, now))) {
      this.quarantine(node, now, result.error ?? "probe failed");
      node.state = "in_use";
      node.lease.restoreState = "quarantined";
    }
    return this.toView(node, now);
  }

  /** In-place identity change on a leased node. Resets age and the failure streak. */
  public async rotate(lease: NodeLease): Promise<boolean> {
    const node = this.leased(lease);
    if (!node?.handle) return false;

    try {
      await this.runtime.rotateIdentity(node.handle);
    } catch (error) {
      this.metrics?.inc("exit_pool_rotations_total", { result: "failed" });
      log.warning("Exit node identity rotation failed.", {
        nodeId: node.id,
        error: errorMessage(error),
      });
      return false;
    }

    node.lastRotatedAt = Date.now();
    node.useTick = ++this.useSequence;
    node.consecutiveFailures = 0;
    node.rotations += 1;
    node.exitAddress = null;
    this.metrics?.inc("exit_pool_rotations_total", { result: "rotated" });
    log.info("Exit node identity rotated.", { nodeId: node.id, rotations: node.rotations });
    return true;
  }

  public releaseProbe(lease: NodeLease): void {
    const node = this.leased(lease);
    if (!node?.lease) return;

    const restoreState = node.lease.restoreState;
    node.lease = null;
    if (node.retireRequested || !this.accepting) {
      void this.beginRetire(node, node.retireRequested ? "requested" : "drain");
      return;
    }
    if (restoreState === "quarantined") {
      node.state = "quarantined";
      this.notify();
      return;
    }
    this.makeAvailable(node);
  }

  /** Retires the node behind a probe lease without handing it to anyone first. */
  public async retireLeased(lease: NodeLease, reason: string): Promise<void> {
    const node = this.leased(lease);
    if (!node) return;
    await this.beginRetire(node, reason);
  }

  /**
   * Idempotent. Unknown or already-removed ids are a no-op. A lent or
   * starting node is marked and torn down when it comes back.
   */
  public async retire(nodeId: string, reason = "requested"): Promise<void> {
    const node = this.nodes.get(nodeId);
    if (!node) return;
    if (node.teardown) return node.teardown;
    if (node.state === "in_use" || node.state === "starting") {
      node.retireRequested = true;
      log.info("Exit node marked for retirement.", { nodeId, state: node.state });
      return;
    }
    await this.beginRetire(node, reason);
  }

  /** Stops lending, fails waiters, waits for leases up to `timeoutMs`, then retires everything. */
  public async drain(timeoutMs: number): Promise<void> {
    if (this.draining) return this.draining;
    this.accepting = false;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolShuttingDownError());
    }

    this.draining = this.drainNodes(timeoutMs);
    return this.draining;
  }

  public view(nodeId: string): ExitNodeView | null {
    const node = this.nodes.get(nodeId);
    return node ? this.toView(node, Date.now()) : null;
  }

  /** Ids of nodes a health probe may lease right now. */
  public probeCandidates(): string[] {
    return [...this.nodes.values()]
      .filter((node) => node.state === "ready" || node.state === "quarantined")
      .map((node) => node.id);
  }

  public snapshot(): PoolSnapshot {
    const now = Date.now();
    const counts = this.stateCounts();
    return {
      accepting: this.accepting,
      size: this.nodes.size,
      minSize: this.config.minSize,
      maxSize: this.config.maxSize,
      waiters: this.waiters.length,
      growthCooldownUntil:
        this.growthCooldownUntil > now ? new Date(this.growthCooldownUntil).toISOString() : null,
      runtimeReachable: this.runtimeReachable,
      counts,
      created: this.created,
      creationFailures: this.creationFailures,
      retired: this.retired,
      nodes: [...this.nodes.values()]
        .sort((a, b) => a.seq - b.seq)
        .map((node) => this.toView(node, now)),
    };
  }

  private async drainNodes(timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    log.info("Draining exit node pool.", { size: this.nodes.size, timeoutMs });

    while (this.hasOutstanding()) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        log.warning("Drain timeout reached with nodes still lent; retiring them anyway.", {
          inUse: this.count("in_use"),
          starting: this.count("starting"),
        });
        break;
      }
      await this.waitForChange(remaining);
    }

    await Promise.all([...this.nodes.values()].map(async (node) => this.beginRetire(node, "drain")));
    await Promise.all([...this.bringUps.values()]);
    log.info("Exit node pool drained.", { retired: this.retired });
  }

  private hasOutstanding(): boolean {
    return [...this.nodes.values()].some(
      (node) => node.state === "in_use" || node.state === "starting",
    );
  }

  private async waitForChange(timeoutMs: number): Promise<void> {
    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.changeListeners.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.changeListeners.add(done);
    });
  }

  private notify(): void {
    this.publishGauges();
    for (const listener of [...this.changeListeners]) listener();
  }

  private pickReady(): ExitNodeRecord | null {
    let best: ExitNodeRecord | null = null;
    for (const node of this.nodes.values()) {
      if (node.state !== "ready" || node.retireRequested) continue;
      if (!best || node.useTick < best.useTick || (node.useTick === best.useTick && node.seq < best.seq)) {
        best = node;
      }
    }
    return best;
  }

  private lend(node: ExitNodeRecord, purpose: LeasePurpose): NodeLease {
    const now = Date.now();
    const handle = node.handle;
    if (!handle) {
      throw new NodeCreationFailedError("Exit node has no runtime handle.", { nodeId: node.id });
    }

    const restoreState: RestorableState = node.state === "quarantined" ? "quarantined" : "ready";
    const leaseId = `lease_${++this.leaseSequence}`;
    node.state = "in_use";
    node.lease = { leaseId, purpose, acquiredAt: now, restoreState };
    if (purpose === "job") {
      node.lastCheckedOutAt = now;
      node.useTick = ++this.useSequence;
    }
    this.metrics?.inc("exit_pool_checkouts_total", { purpose });
    this.publishGauges();

    return { leaseId, nodeId: node.id, proxy: { ...handle.proxy }, purpose, acquiredAt: now };
  }

  private leased(lease: NodeLease): ExitNodeRecord | null {
    const node = this.nodes.get(lease.nodeId);
    if (!node || node.state !== "in_use" || node.lease?.leaseId !== lease.leaseId) return null;
    return node;
  }

  /** Puts a node back into rotation, handing it straight to the oldest waiter if any. */
  private makeAvailable(node: ExitNodeRecord): void {
    node.state = "ready";
    node.lease = null;

    const waiter = this.accepting ? this.waiters.shift() : undefined;
    if (waiter) {
      clearTimeout(waiter.timer);
      this.metrics?.observeMs("exit_pool_checkout_wait_ms", {}, Date.now() - waiter.enqueuedAt);
      waiter.resolve(this.lend(node, "job"));
    }
    this.notify();
  }

  private quarantine(node: ExitNodeRecord, now: number, reason: string): void {
    node.state = "quarantined";
    if (node.quarantinedAt === null) node.quarantinedAt = now;
    this.metrics?.inc("exit_pool_quarantines_total");
    log.warning("Exit node quarantined.", {
      nodeId: node.id,
      consecutiveFailures: node.consecutiveFailures,
      reason,
    });
  }

  private endQuarantine(node: ExitNodeRecord, now: number): void {
    if (node.quarantinedAt === null) return;
    node.quarantineTotalMs += now - node.quarantinedAt;
    node.quarantinedAt = null;
  }

  private canGrow(now: number): boolean {
    return this.accepting && this.nodes.size < this.config.maxSize && now >= this.growthCooldownUntil;
  }

  private replenish(): void {
    const now = Date.now();
    let starting = this.count("starting");
    while (
      this.canGrow(now) &&
      (this.nodes.size < this.config.minSize || this.waiters.length > starting)
    ) {
      this.grow();
      starting += 1;
    }
  }

  /** Reserves the slot synchronously so concurrent callers never over-create. */
  private grow(): void {
    const now = Date.now();
    const seq = ++this.sequence;
    const node: ExitNodeRecord = {
      id: `exit_${seq}_${randomSuffix()}`,
      seq,
      handle: null,
      state: "starting",
      exitAddress: null,
      createdAt: now,
      lastRotatedAt: now,
      lastHealthyAt: null,
      lastCheckedOutAt: null,
      lastProbedAt: null,
      useTick: 0,
      consecutiveFailures: 0,
      quarantinedAt: null,
      quarantineTotalMs: 0,
      successes: 0,
      failures: 0,
      blocked: 0,
      rotations: 0,
      lease: null,
      retireRequested: false,
      teardown: null,
    };
    this.nodes.set(node.id, node);

    const task = this.bringUp(node).finally(() => {
      this.bringUps.delete(node.id);
      this.notify();
    });
    this.bringUps.set(node.id, task);
    this.publishGauges();
  }

  private async bringUp(node: ExitNodeRecord): Promise<void> {
    let handle: RuntimeHandle;
    try {
      handle = await this.runtime.launch();
    } catch (error) {
      this.onCreationFailure(node, error);
      return;
    }

    this.unavailableStreak = 0;
    if (!this.runtimeReachable) {
      this.runtimeReachable = true;
      log.info("Container runtime reachable again.");
    }

    if (node.state !== "starting") {
      await this.discardHandle(handle, node.id);
      return;
    }
    node.handle = handle;

    const probe = await this.awaitStartup(node, handle);
    if (node.state !== "starting") {
      await this.discardHandle(handle, node.id);
      return;
    }
    if (!probe) {
      this.onCreationFailure(
        node,
        new NodeCreationFailedError("Exit node did not pass its first health probe.", {
          nodeId: node.id,
          attempts: this.config.startupProbeAttempts,
        }),
      );
      return;
    }

    const now = Date.now();
    node.lastHealthyAt = now;
    node.lastRotatedAt = now;
    node.exitAddress = probe.exitAddress;
    node.useTick = ++this.useSequence;
    this.created += 1;
    this.metrics?.inc("exit_pool_nodes_created_total");
    log.info("Exit node ready.", {
      nodeId: node.id,
      runtimeId: handle.id,
      exitAddress: probe.exitAddress,
      startupMs: now - node.createdAt,
    });

    if (node.retireRequested || !this.accepting) {
      await this.beginRetire(node, node.retireRequested ? "requested" : "drain");
      return;
    }
    this.makeAvailable(node);
  }

  private async awaitStartup(node: ExitNodeRecord, handle: RuntimeHandle): Promise<ProbeResult | null> {
    const attempts = Math.max(1, this.config.startupProbeAttempts);
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (node.state !== "starting") return null;

      if (await this.runtime.inspect(handle)) {
        const result = await this.probeSafely(node.id, handle.proxy);
        node.lastProbedAt = Date.now();
        if (result.healthy) return result;
        log.debug("Exit node not ready yet.", { nodeId: node.id, attempt, error: result.error });
      } else {
        log.debug("Exit node container not running yet.", { nodeId: node.id, attempt });
      }

      if (attempt < attempts && this.config.startupProbeIntervalMs > 0) {
        await sleep(this.config.startupProbeIntervalMs);
      }
    }
    return null;
  }

  private async probeSafely(nodeId: string, proxy: Endpoint): Promise<ProbeResult> {
    const started = Date.now();
    try {
      return await this.prober.probe({ nodeId, proxy });
    } catch (error) {
      return { healthy: false, latencyMs: Date.now() - started, exitAddress: null, error: errorMessage(error) };
    }
  }

  private onCreationFailure(node: ExitNodeRecord, error: unknown): void {
    const now = Date.now();
    if (this.nodes.get(node.id) === node && node.state === "starting") {
      node.state = "dead";
      this.nodes.delete(node.id);
      if (node.handle) void this.discardHandle(node.handle, node.id);
    }

    this.creationFailures += 1;
    this.growthCooldownUntil = now + this.config.creationCooldownMs;
    this.metrics?.inc("exit_pool_node_creation_failures_total");

    const message = errorMessage(error);
    log.warning("Exit node creation failed; growth paused.", {
      nodeId: node.id,
      error: message,
      cooldownMs: this.config.creationCooldownMs,
    });

    if (error instanceof RuntimeUnavailableError) {
      this.unavailableStreak += 1;
      if (this.unavailableStreak >= this.config.runtimeUnreachableThreshold && this.runtimeReachable) {
        this.runtimeReachable = false;
        void this.incidents?.report({
          level: "critical",
          kind: "runtime_unreachable",
          subject: "container-runtime",
          message,
          details: { consecutiveFailures: this.unavailableStreak },
        });
      }
      return;
    }

    this.unavailableStreak = 0;
    void this.incidents?.report({
      level: "warning",
      kind: "node_creation_failed",
      subject: node.id,
      message,
      details: null,
    });
  }

  private async discardHandle(handle: RuntimeHandle, nodeId: string): Promise<void> {
    try {
      await this.runtime.terminate(handle);
    } catch (error) {
      log.warning("Failed to discard exit node runtime.", {
        nodeId,
        runtimeId: handle.id,
        error: errorMessage(error),
      });
    }
  }

  private beginRetire(node: ExitNodeRecord, reason: string): Promise<void> {
    if (node.teardown) return node.teardown;

    const now = Date.now();
    this.endQuarantine(node, now);
    node.state = "retiring";
    node.lease = null;
    this.retired += 1;
    this.metrics?.inc("exit_pool_nodes_retired_total", { reason });
    log.info("Retiring exit node.", {
      nodeId: node.id,
      reason,
      consecutiveFailures: node.consecutiveFailures,
      rotations: node.rotations,
    });
    if (reason !== "drain") {
      void this.incidents?.report({
        level: "warning",
        kind: "node_retired",
        subject: node.id,
        message: `Exit node retired: ${reason}`,
        details: {
          consecutiveFailures: node.consecutiveFailures,
          quarantinedMs: node.quarantineTotalMs,
        },
      });
    }

    node.teardown = this.teardown(node);
    this.publishGauges();
    return node.teardown;
  }

  private async teardown(node: ExitNodeRecord): Promise<void> {
    const handle = node.handle;
    if (handle) {
      try {
        await this.releaseProxy?.(handle.proxy);
      } catch (error) {
        log.debug("Failed releasing proxy connections.", { nodeId: node.id, error: errorMessage(error) });
      }
      await this.discardHandle(handle, node.id);
    }

    node.state = "dead";
    this.nodes.delete(node.id);
    this.notify();
    if (this.accepting) this.replenish();
  }

  private subjectOf(node: ExitNodeRecord, now: number): RotationSubject {
    return {
      lastRotatedAt: node.lastRotatedAt,
      consecutiveFailures: node.consecutiveFailures,
      quarantinedMs: node.quarantineTotalMs + (node.quarantinedAt === null ? 0 : now - node.quarantinedAt),
    };
  }

  private toView(node: ExitNodeRecord, now: number): ExitNodeView {
    return {
      id: node.id,
      state: node.state,
      proxy: node.handle ? { ...node.handle.proxy } : null,
      exitAddress: node.exitAddress,
      createdAt: node.createdAt,
      lastRotatedAt: node.lastRotatedAt,
      lastHealthyAt: node.lastHealthyAt,
      lastCheckedOutAt: node.lastCheckedOutAt,
      lastProbedAt: node.lastProbedAt,
      consecutiveFailures: node.consecutiveFailures,
      quarantinedMs: this.subjectOf(node, now).quarantinedMs,
      successes: node.successes,
      failures: node.failures,
      blocked: node.blocked,
      rotations: node.rotations,
    };
  }

  private count(state: ExitNodeState): number {
    let total = 0;
    for (const node of this.nodes.values()) if (node.state === state) total += 1;
    return total;
  }

  private stateCounts(): Record<ExitNodeState, number> {
    const counts: Record<ExitNodeState, number> = {
      starting: 0,
      ready: 0,
      in_use: 0,
      quarantined: 0,
      retiring: 0,
      dead: 0,
    };
    for (const node of this.nodes.values()) counts[node.state] += 1;
    return counts;
  }

  private publishGauges(): void {
    if (!this.metrics) return;
    const counts = this.stateCounts();
    for (const state of STATES) this.metrics.set("exit_pool_nodes", { state }, counts[state]);
    this.metrics.set("exit_pool_waiters", {}, this.waiters.length);
  }
}
