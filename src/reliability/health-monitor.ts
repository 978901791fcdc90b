import { log } from "apify";
import type { MetricsRegistry } from "../observability/metrics";
import type { ExitNodePool } from "../runtime/exit-node-pool";
import { errorMessage } from "../runtime/errors";
import type { NodeLease } from "../runtime/types";
import type { NodeProber, ProbeResult } from "./node-prober";
import type { RotationPolicy } from "./rotation-policy";

export type ProbeOutcome = "skipped" | "healthy" | "unhealthy" | "rotated" | "retired";

export interface HealthMonitorConfig {
  intervalMs: number;
}

export interface HealthMonitorDeps {
  pool: ExitNodePool;
  prober: NodeProber;
  policy: RotationPolicy;
  metrics?: MetricsRegistry;
}

export interface HealthMonitorStatus {
  running: boolean;
  intervalMs: number;
  ticks: number;
  lastTickAt: string | null;
  inFlight: number;
}

/**
 * Out-of-band probing. A probe is a lease like any job checkout, so it can
 * never overlap a dispatch on the same node.
 */
export class HealthMonitor {
  private readonly config: HealthMonitorConfig;
  private readonly pool: ExitNodePool;
  private readonly prober: NodeProber;
  private readonly policy: RotationPolicy;
  private readonly metrics: MetricsRegistry | null;
  private readonly inFlight = new Map<string, Promise<ProbeOutcome>>();
  private timer: NodeJS.Timeout | null = null;
  private ticks = 0;
  private lastTickAt: number | null = null;

  public constructor(config: HealthMonitorConfig, deps: HealthMonitorDeps) {
    this.config = config;
    this.pool = deps.pool;
    this.prober = deps.prober;
    this.policy = deps.policy;
    this.metrics = deps.metrics ?? null;
  }

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.intervalMs);
    log.info("Health monitor started.", { intervalMs: this.config.intervalMs });
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.all([...this.inFlight.values()]);
  }

  public getStatus(): HealthMonitorStatus {
    return {
      running: this.timer !== null,
      intervalMs: this.config.intervalMs,
      ticks: this.ticks,
      lastTickAt: this.lastTickAt === null ? null : new Date(this.lastTickAt).toISOString(),
      inFlight: this.inFlight.size,
    };
  }

  public async tick(): Promise<ProbeOutcome[]> {
    this.ticks += 1;
    this.lastTickAt = Date.now();
    this.pool.ensureMinimum();
    return Promise.all(this.pool.probeCandidates().map(async (nodeId) => this.probeNode(nodeId)));
  }

  /** At most one probe per node; a second caller shares the running one. */
  public async probeNode(nodeId: string): Promise<ProbeOutcome> {
    const running = this.inFlight.get(nodeId);
    if (running) return running;

    const task = this.runProbe(nodeId).finally(() => {
      this.inFlight.delete(nodeId);
    });
    this.inFlight.set(nodeId, task);
    return task;
  }

  private async runProbe(nodeId: string): Promise<ProbeOutcome> {
    const lease = this.pool.acquireProbe(nodeId);
    if (!lease) return "skipped";

    let released = false;
    try {
      const result = await this.probe(lease);
      this.metrics?.observeMs("exit_node_probe_latency_ms", { healthy: result.healthy }, result.latencyMs);

      const view = this.pool.recordProbe(lease, result, this.policy);
      if (!view) return "skipped";

      if (!result.healthy) {
        log.warning("Exit node probe failed.", {
          nodeId,
          consecutiveFailures: view.consecutiveFailures,
          error: result.error,
        });
        if (this.policy.shouldRetire(view)) {
          released = true;
          await this.pool.retireLeased(lease, "probe_failures");
          return "retired";
        }
        if (this.policy.shouldRotate(view)) {
          return (await this.pool.rotate(lease)) ? "rotated" : "unhealthy";
        }
        return "unhealthy";
      }

      if (this.policy.shouldRotate(view)) {
        return (await this.pool.rotate(lease)) ? "rotated" : "healthy";
      }
      return "healthy";
    } finally {
      if (!released) this.pool.releaseProbe(lease);
    }
  }

  private async probe(lease: NodeLease): Promise<ProbeResult> {
    const started = Date.now();
    try {
      return await this.prober.probe({ nodeId: lease.nodeId, proxy: lease.proxy });
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - started,
        exitAddress: null,
        error: errorMessage(error),
      };
    }
  }
}
