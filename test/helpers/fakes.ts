import { CircuitRuntime } from "../../src/runtime/circuit-runtime";
import type { ContainerRuntime } from "../../src/runtime/container-runtime";
import type { ControlChannel } from "../../src/runtime/control-channel";
import { ControlCommandError } from "../../src/runtime/errors";
import { ExitNodePool, type ExitNodePoolConfig } from "../../src/runtime/exit-node-pool";
import type { Endpoint, RuntimeHandle, RuntimeStartConfig } from "../../src/runtime/types";
import type { NodeProber, ProbeResult, ProbeSubject } from "../../src/reliability/node-prober";
import { ThresholdRotationPolicy, type RotationThresholds } from "../../src/reliability/rotation-policy";
import type { ResultSink } from "../../src/dispatch/result-sink";
import type { ScrapeArtifact, ScrapeJob, ScrapeRequest } from "../../src/dispatch/types";
import type { ScrapeTransport } from "../../src/dispatch/transport";
import { RequestFailedError } from "../../src/runtime/errors";

export class FakeContainerRuntime implements ContainerRuntime {
  public readonly started: RuntimeHandle[] = [];
  public readonly stopped: string[] = [];
  public readonly startFailures: Error[] = [];
  public running = true;
  private counter = 0;

  public async start(config: RuntimeStartConfig): Promise<RuntimeHandle> {
    const failure = this.startFailures.shift();
    if (failure) throw failure;
    this.counter += 1;
    const handle: RuntimeHandle = {
      id: config.name,
      proxy: { host: "127.0.0.1", port: 20000 + this.counter },
      control: { host: "127.0.0.1", port: 30000 + this.counter },
      startedAt: Date.now(),
    };
    this.started.push(handle);
    return handle;
  }

  public async stop(handle: RuntimeHandle): Promise<void> {
    this.stopped.push(handle.id);
  }

  public async probe(): Promise<boolean> {
    return this.running;
  }
}

export class FakeControlChannel implements ControlChannel {
  public readonly calls: Endpoint[] = [];
  public fail = false;

  public async rotateIdentity(endpoint: Endpoint): Promise<void> {
    this.calls.push(endpoint);
    if (this.fail) throw new ControlCommandError("Control command rejected: 515 Authentication failed");
  }
}

export class FakeProber implements NodeProber {
  public readonly calls: ProbeSubject[] = [];
  public healthy = true;
  /** Nodes that fail every probe even while `healthy` is true. */
  public readonly failing = new Set<string>();

  public async probe(subject: ProbeSubject): Promise<ProbeResult> {
    this.calls.push(subject);
    return this.healthy && !this.failing.has(subject.nodeId)
      ? { healthy: true, latencyMs: 1, exitAddress: "198.51.100.7", error: null }
      : { healthy: false, latencyMs: 1, exitAddress: null, error: "probe failed" };
  }
}

export const DEFAULT_THRESHOLDS: RotationThresholds = {
  maxAgeMs: 600000,
  failureThreshold: 3,
  retireThreshold: 6,
  quarantineCeilingMs: 300000,
};

export const DEFAULT_POOL_CONFIG: ExitNodePoolConfig = {
  minSize: 2,
  maxSize: 5,
  checkoutTimeoutMs: 200,
  creationCooldownMs: 0,
  startupProbeAttempts: 1,
  startupProbeIntervalMs: 0,
  runtimeUnreachableThreshold: 3,
};

export const createTestPool = (
  config: Partial<ExitNodePoolConfig> = {},
  thresholds: Partial<RotationThresholds> = {},
) => {
  const containers = new FakeContainerRuntime();
  const control = new FakeControlChannel();
  const prober = new FakeProber();
  let names = 0;
  const runtime = new CircuitRuntime({
    containers,
    control,
    nameFactory: () => {
      names += 1;
      return `exitnode_test${names}`;
    },
  });
  const policy = new ThresholdRotationPolicy({ ...DEFAULT_THRESHOLDS, ...thresholds });
  const pool = new ExitNodePool({ ...DEFAULT_POOL_CONFIG, ...config }, { runtime, prober, policy });
  return { pool, containers, control, prober, policy, runtime };
};

export const artifactFor = (url: string): ScrapeArtifact => ({
  url,
  finalUrl: url,
  statusCode: 200,
  headers: { "content-type": "text/html" },
  body: "<html>ok</html>",
  bodyBytes: 15,
  fetchedAt: new Date(0).toISOString(),
  durationMs: 1,
});

/** Answers each request through `respond`, which sees the 1-based request number. */
export class ScriptedTransport implements ScrapeTransport {
  public readonly requests: ScrapeRequest[] = [];
  public readonly released: Endpoint[] = [];
  private readonly respond: (requestNumber: number, request: ScrapeRequest) => Promise<ScrapeArtifact>;

  public constructor(respond: (requestNumber: number, request: ScrapeRequest) => Promise<ScrapeArtifact>) {
    this.respond = respond;
  }

  public async fetch(request: ScrapeRequest): Promise<ScrapeArtifact> {
    this.requests.push(request);
    return this.respond(this.requests.length, request);
  }

  public async release(proxy: Endpoint): Promise<void> {
    this.released.push(proxy);
  }

  public async close(): Promise<void> {}
}

export const serverError = (): RequestFailedError =>
  new RequestFailedError("Target answered HTTP 500.", { httpStatus: 500 });

export class RecordingSink implements ResultSink {
  public readonly succeeded: Array<{ jobId: string; artifact: ScrapeArtifact; job: ScrapeJob }> = [];
  public readonly abandoned: Array<{ jobId: string; reason: string; job: ScrapeJob }> = [];

  public async onSucceeded(jobId: string, artifact: ScrapeArtifact, job: ScrapeJob): Promise<void> {
    this.succeeded.push({ jobId, artifact, job });
  }

  public async onAbandoned(jobId: string, reason: string, job: ScrapeJob): Promise<void> {
    this.abandoned.push({ jobId, reason, job });
  }
}
