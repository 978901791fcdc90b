import { Actor, log } from "apify";
import type { AddressInfo } from "node:net";
import { createJobRequestValidator } from "./api/schema-validation";
import { buildRuntimeConfig, ConfigValidationError } from "./config";
import { DatasetResultSink } from "./dispatch/result-sink";
import { ScrapeScheduler } from "./dispatch/scrape-scheduler";
import { ProxyHttpTransport } from "./dispatch/transport";
import { installCorrelationLogging } from "./observability/correlation-log";
import { MetricsRegistry } from "./observability/metrics";
import { HealthMonitor } from "./reliability/health-monitor";
import { IncidentReporter } from "./reliability/incident-reporter";
import { HttpNodeProber } from "./reliability/node-prober";
import { createStrictPolicy, PolicySelector, ThresholdRotationPolicy } from "./reliability/rotation-policy";
import { CircuitRuntime } from "./runtime/circuit-runtime";
import { TorControlChannel } from "./runtime/control-channel";
import { DockerContainerRuntime } from "./runtime/docker-runtime";
import { errorMessage } from "./runtime/errors";
import { ExitNodePool } from "./runtime/exit-node-pool";
import { installLogRedaction } from "./security/secure-log";
import { createApiServer } from "./server";
import type { ActorInput } from "./types";

const closeServer = async (server: ReturnType<typeof createApiServer>): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });

const run = async (): Promise<void> => {
  await Actor.init();

  const input = (await Actor.getInput<ActorInput>()) ?? {};
  const runtime = buildRuntimeConfig(input);

  log.setLevel(log.LEVELS[runtime.logLevel]);
  installLogRedaction(log, runtime.logRedactionEnabled);
  installCorrelationLogging(log, true);

  const metrics = new MetricsRegistry();
  const incidents = new IncidentReporter({
    webhookUrl: runtime.incidentWebhookUrl,
    maxRecentEvents: 50,
  });

  const circuits = new CircuitRuntime({
    containers: new DockerContainerRuntime({
      binary: runtime.dockerBinary,
      image: runtime.dockerImage,
      commandTimeoutMs: runtime.dockerCommandTimeoutMs,
      portRangeMin: runtime.portRangeMin,
      portRangeMax: runtime.portRangeMax,
      controlPassword: runtime.controlPassword,
    }),
    control: new TorControlChannel({
      password: runtime.controlPassword,
      timeoutMs: runtime.controlTimeoutMs,
    }),
  });

  const transport = new ProxyHttpTransport();
  const prober = new HttpNodeProber({
    transport,
    probeUrl: runtime.healthProbeUrl,
    timeoutMs: runtime.healthProbeTimeoutMs,
  });

  const thresholds = {
    maxAgeMs: runtime.rotationMaxAgeMs,
    failureThreshold: runtime.rotationFailureThreshold,
    retireThreshold: runtime.retireFailureThreshold,
    quarantineCeilingMs: runtime.retireQuarantineCeilingMs,
  };
  const defaultPolicy = new ThresholdRotationPolicy(thresholds);
  const policies = new PolicySelector(defaultPolicy, createStrictPolicy(thresholds), runtime.strictPolicyHosts);

  const pool = new ExitNodePool(
    {
      minSize: runtime.poolMinSize,
      maxSize: runtime.poolMaxSize,
      checkoutTimeoutMs: runtime.checkoutTimeoutMs,
      creationCooldownMs: runtime.nodeCreationCooldownMs,
      startupProbeAttempts: runtime.startupProbeAttempts,
      startupProbeIntervalMs: runtime.startupProbeIntervalMs,
      runtimeUnreachableThreshold: runtime.runtimeUnreachableThreshold,
    },
    {
      runtime: circuits,
      prober,
      policy: defaultPolicy,
      incidents,
      metrics,
      releaseProxy: async (proxy) => transport.release(proxy),
    },
  );

  const monitor = new HealthMonitor(
    { intervalMs: runtime.healthProbeIntervalMs },
    { pool, prober, policy: defaultPolicy, metrics },
  );

  const dataset = await Actor.openDataset();
  const scheduler = new ScrapeScheduler(
    {
      workers: runtime.dispatchWorkers,
      requestTimeoutMs: runtime.requestTimeoutMs,
      defaultMaxAttempts: runtime.defaultMaxAttempts,
      backoff: {
        baseDelayMs: runtime.backoffBaseMs,
        capDelayMs: runtime.backoffCapMs,
        jitterWindowMs: runtime.backoffJitterMs,
      },
      exhaustedRequeueDelayMs: runtime.exhaustedRequeueDelayMs,
      sinkHandoffTimeoutMs: runtime.sinkHandoffTimeoutMs,
      jobRetention: runtime.jobRetention,
    },
    {
      pool,
      transport,
      sink: new DatasetResultSink(dataset, { includeBody: runtime.datasetIncludeBody }),
      policies,
      incidents,
      metrics,
    },
  );

  await pool.start();
  monitor.start();
  scheduler.start();

  let shuttingDown = false;

  const server = createApiServer(
    {
      isShuttingDown: () => shuttingDown,
      isAcceptingJobs: () => scheduler.isAccepting() && pool.isAccepting(),
      isRuntimeReachable: () => pool.isRuntimeReachable(),
      getPoolSnapshot: () => pool.snapshot(),
      getSchedulerStats: () => scheduler.stats(),
      getMonitorStatus: () => monitor.getStatus(),
      getIncidents: () => incidents.snapshot(),
      submitJob: (submission) => scheduler.submit(submission),
      getJob: (jobId) => scheduler.get(jobId),
    },
    metrics,
  );

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(runtime.port, runtime.host, () => resolve());
  });

  const address = server.address();
  const listening: AddressInfo | null = address !== null && typeof address === "object" ? address : null;
  log.info("Exit node pool service started", {
    host: runtime.host,
    port: listening?.port ?? runtime.port,
    logLevel: runtime.logLevel,
    poolMinSize: runtime.poolMinSize,
    poolMaxSize: runtime.poolMaxSize,
    dispatchWorkers: runtime.dispatchWorkers,
    healthProbeIntervalMs: runtime.healthProbeIntervalMs,
    rotationMaxAgeMs: runtime.rotationMaxAgeMs,
    rotationFailureThreshold: runtime.rotationFailureThreshold,
    retireFailureThreshold: runtime.retireFailureThreshold,
    strictPolicyHosts: runtime.strictPolicyHosts.length,
    dockerImage: runtime.dockerImage,
    incidentWebhookEnabled: Boolean(runtime.incidentWebhookUrl),
    logRedactionEnabled: runtime.logRedactionEnabled,
    listeningAddress: listening?.address ?? runtime.host,
  });

  const validateJobRequest = createJobRequestValidator();
  runtime.jobs.forEach((entry, index) => {
    try {
      scheduler.submit(validateJobRequest(entry));
    } catch (error) {
      log.warning("Skipping invalid job from actor input.", { index, error: errorMessage(error) });
    }
  });

  const shutdown = async (reason: "aborting" | "migrating" | "signal" | "idle"): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.warning("Shutdown started.", { reason });

    await closeServer(server);
    await scheduler.stop(runtime.shutdownDrainTimeoutMs);
    await monitor.stop();
    await pool.drain(runtime.shutdownDrainTimeoutMs);
    await transport.close();
    log.info("Shutdown complete.", { reason, pool: pool.snapshot().size, scheduler: scheduler.stats() });
  };

  Actor.on("aborting", async () => {
    await shutdown("aborting");
    await Actor.exit();
  });

  Actor.on("migrating", async () => {
    await shutdown("migrating");
  });

  const onSignal = (): void => {
    void shutdown("signal")
      .then(async () => {
        await Actor.exit();
      })
      .catch((error: unknown) => {
        log.error("Shutdown failed.", { error: errorMessage(error) });
        process.exitCode = 1;
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  if (runtime.exitWhenIdle) {
    await scheduler.whenIdle();
    log.info("All jobs finished; exiting.", { ...scheduler.stats() });
    await shutdown("idle");
    await Actor.exit();
  }
};

run().catch(async (error: unknown) => {
  if (error instanceof ConfigValidationError) {
    log.error("Actor bootstrap failed due to invalid configuration.", {
      issues: error.issues,
    });
    await Actor.fail(error.message);
    return;
  }

  const failure = error instanceof Error ? error : new Error(String(error));
  log.exception(failure, "Actor bootstrap failed");
  await Actor.fail(failure.message);
});
