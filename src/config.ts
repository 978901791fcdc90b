import { config as loadDotEnv } from "dotenv";
import type { ActorInput, LogLevelName, RuntimeConfig } from "./types";

loadDotEnv();

const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ["DEBUG", "INFO", "WARNING", "ERROR"];
const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(
      `Configuration validation failed:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

type Env = Record<string, string | undefined>;

const isLogLevel = (value: string): value is LogLevelName =>
  ALLOWED_LOG_LEVELS.some((level) => level === value);

const parseBooleanWithValidation = (
  value: boolean | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: boolean,
): boolean => {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return fallback;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  issues.push(
    `\`${fieldName}\` must be a boolean (true/false, 1/0, yes/no). Received: ${JSON.stringify(value)}.`,
  );
  return fallback;
};

const parseIntegerWithRangeValidation = (
  value: number | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number,
  min: number,
  max: number,
): number => {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim().length > 0
        ? Number(value)
        : fallback;

  if (!Number.isInteger(parsed)) {
    issues.push(`\`${fieldName}\` must be an integer. Received: ${JSON.stringify(value)}.`);
    return fallback;
  }
  if (parsed < min || parsed > max) {
    issues.push(`\`${fieldName}\` must be within ${min}-${max}. Received: ${parsed}.`);
    return fallback;
  }
  return parsed;
};

const parseNonEmptyString = (
  value: string | undefined,
  fieldName: string,
  issues: string[],
  fallback: string,
): string => {
  if (typeof value !== "string") return fallback;
  const normalized = value.trim();
  if (!normalized) {
    issues.push(`\`${fieldName}\` must be a non-empty string.`);
    return fallback;
  }
  return normalized;
};

const parseHttpUrl = (
  value: string | undefined,
  fieldName: string,
  issues: string[],
): string | null => {
  if (typeof value !== "string" || value.trim().length === 0) return null;
  try {
    const url = new URL(value.trim());
    if (url.protocol === "http:" || url.protocol === "https:") return url.toString();
  } catch {
    // reported below
  }
  issues.push(`\`${fieldName}\` must be an http(s) URL. Received: ${JSON.stringify(value)}.`);
  return null;
};

const parseHostList = (value: string[] | string | undefined): string[] => {
  const entries = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
  return [...new Set(entries.map((entry) => entry.trim().toLowerCase()).filter(Boolean))];
};

export const buildRuntimeConfig = (input: ActorInput, env: Env = process.env): RuntimeConfig => {
  const issues: string[] = [];

  const rawHost = input.host ?? env.HOST ?? "0.0.0.0";
  const host = rawHost.trim();
  if (!host) {
    issues.push("`host` must be a non-empty string (input `host` or env `HOST`).");
  }

  const port = parseIntegerWithRangeValidation(input.port ?? env.PORT, "port", issues, 3000, 1, 65535);

  const rawLogLevel = String(input.logLevel ?? env.LOG_LEVEL ?? "INFO").toUpperCase();
  let logLevel: LogLevelName = "INFO";
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    issues.push(
      `\`logLevel\` must be one of ${ALLOWED_LOG_LEVELS.join(", ")}. Received: ${JSON.stringify(rawLogLevel)} (input \`logLevel\` or env \`LOG_LEVEL\`).`,
    );
  }

  const poolMinSize = parseIntegerWithRangeValidation(
    input.poolMinSize ?? env.POOL_MIN_SIZE,
    "poolMinSize",
    issues,
    2,
    0,
    64,
  );
  const poolMaxSize = parseIntegerWithRangeValidation(
    input.poolMaxSize ?? env.POOL_MAX_SIZE,
    "poolMaxSize",
    issues,
    5,
    1,
    64,
  );
  if (poolMinSize > poolMaxSize) {
    issues.push("`poolMinSize` must be less than or equal to `poolMaxSize`.");
  }

  const checkoutTimeoutMs = parseIntegerWithRangeValidation(
    input.checkoutTimeoutMs ?? env.CHECKOUT_TIMEOUT_MS,
    "checkoutTimeoutMs",
    issues,
    15000,
    10,
    600000,
  );

  const nodeCreationCooldownMs = parseIntegerWithRangeValidation(
    input.nodeCreationCooldownMs ?? env.NODE_CREATION_COOLDOWN_MS,
    "nodeCreationCooldownMs",
    issues,
    30000,
    0,
    3600000,
  );

  const startupProbeAttempts = parseIntegerWithRangeValidation(
    input.startupProbeAttempts ?? env.STARTUP_PROBE_ATTEMPTS,
    "startupProbeAttempts",
    issues,
    20,
    1,
    200,
  );

  const startupProbeIntervalMs = parseIntegerWithRangeValidation(
    input.startupProbeIntervalMs ?? env.STARTUP_PROBE_INTERVAL_MS,
    "startupProbeIntervalMs",
    issues,
    3000,
    0,
    60000,
  );

  const healthProbeIntervalMs = parseIntegerWithRangeValidation(
    input.healthProbeIntervalMs ?? env.HEALTH_PROBE_INTERVAL_MS,
    "healthProbeIntervalMs",
    issues,
    30000,
    100,
    3600000,
  );

  const healthProbeTimeoutMs = parseIntegerWithRangeValidation(
    input.healthProbeTimeoutMs ?? env.HEALTH_PROBE_TIMEOUT_MS,
    "healthProbeTimeoutMs",
    issues,
    15000,
    100,
    120000,
  );

  const healthProbeUrl =
    parseHttpUrl(input.healthProbeUrl ?? env.HEALTH_PROBE_URL, "healthProbeUrl", issues) ??
    "https://check.torproject.org/api/ip";

  const rotationMaxAgeMs = parseIntegerWithRangeValidation(
    input.rotationMaxAgeMs ?? env.ROTATION_MAX_AGE_MS,
    "rotationMaxAgeMs",
    issues,
    600000,
    1000,
    86400000,
  );

  const rotationFailureThreshold = parseIntegerWithRangeValidation(
    input.rotationFailureThreshold ?? env.ROTATION_FAILURE_THRESHOLD,
    "rotationFailureThreshold",
    issues,
    3,
    1,
    100,
  );

  const retireFailureThreshold = parseIntegerWithRangeValidation(
    input.retireFailureThreshold ?? env.RETIRE_FAILURE_THRESHOLD,
    "retireFailureThreshold",
    issues,
    6,
    1,
    1000,
  );
  // Rotation is the first response to failures; retirement must not pre-empt it.
  if (retireFailureThreshold < rotationFailureThreshold) {
    issues.push(
      "`retireFailureThreshold` must be greater than or equal to `rotationFailureThreshold`.",
    );
  }

  const retireQuarantineCeilingMs = parseIntegerWithRangeValidation(
    input.retireQuarantineCeilingMs ?? env.RETIRE_QUARANTINE_CEILING_MS,
    "retireQuarantineCeilingMs",
    issues,
    300000,
    1000,
    86400000,
  );

  const strictPolicyHosts = parseHostList(input.strictPolicyHosts ?? env.STRICT_POLICY_HOSTS);

  const requestTimeoutMs = parseIntegerWithRangeValidation(
    input.requestTimeoutMs ?? env.REQUEST_TIMEOUT_MS,
    "requestTimeoutMs",
    issues,
    30000,
    100,
    600000,
  );

  const backoffBaseMs = parseIntegerWithRangeValidation(
    input.backoffBaseMs ?? env.BACKOFF_BASE_MS,
    "backoffBaseMs",
    issues,
    1000,
    0,
    600000,
  );
  const backoffCapMs = parseIntegerWithRangeValidation(
    input.backoffCapMs ?? env.BACKOFF_CAP_MS,
    "backoffCapMs",
    issues,
    60000,
    0,
    3600000,
  );
  if (backoffBaseMs > backoffCapMs) {
    issues.push("`backoffBaseMs` must be less than or equal to `backoffCapMs`.");
  }
  const backoffJitterMs = parseIntegerWithRangeValidation(
    input.backoffJitterMs ?? env.BACKOFF_JITTER_MS,
    "backoffJitterMs",
    issues,
    500,
    0,
    600000,
  );

  const exhaustedRequeueDelayMs = parseIntegerWithRangeValidation(
    input.exhaustedRequeueDelayMs ?? env.EXHAUSTED_REQUEUE_DELAY_MS,
    "exhaustedRequeueDelayMs",
    issues,
    2000,
    0,
    600000,
  );

  const dispatchWorkers = parseIntegerWithRangeValidation(
    input.dispatchWorkers ?? env.DISPATCH_WORKERS,
    "dispatchWorkers",
    issues,
    4,
    1,
    256,
  );

  const defaultMaxAttempts = parseIntegerWithRangeValidation(
    input.defaultMaxAttempts ?? env.DEFAULT_MAX_ATTEMPTS,
    "defaultMaxAttempts",
    issues,
    3,
    1,
    50,
  );

  const sinkHandoffTimeoutMs = parseIntegerWithRangeValidation(
    input.sinkHandoffTimeoutMs ?? env.SINK_HANDOFF_TIMEOUT_MS,
    "sinkHandoffTimeoutMs",
    issues,
    2000,
    10,
    60000,
  );

  const jobRetention = parseIntegerWithRangeValidation(
    input.jobRetention ?? env.JOB_RETENTION,
    "jobRetention",
    issues,
    10000,
    10,
    1000000,
  );

  const dockerBinary = parseNonEmptyString(
    input.dockerBinary ?? env.DOCKER_BINARY,
    "dockerBinary",
    issues,
    "docker",
  );

  const dockerImage = parseNonEmptyString(
    input.dockerImage ?? env.DOCKER_IMAGE,
    "dockerImage",
    issues,
    "exit-node-tor:latest",
  );

  const dockerCommandTimeoutMs = parseIntegerWithRangeValidation(
    input.dockerCommandTimeoutMs ?? env.DOCKER_COMMAND_TIMEOUT_MS,
    "dockerCommandTimeoutMs",
    issues,
    60000,
    1000,
    600000,
  );

  const portRangeMin = parseIntegerWithRangeValidation(
    input.portRangeMin ?? env.PORT_RANGE_MIN,
    "portRangeMin",
    issues,
    40001,
    1024,
    65535,
  );
  const portRangeMax = parseIntegerWithRangeValidation(
    input.portRangeMax ?? env.PORT_RANGE_MAX,
    "portRangeMax",
    issues,
    60001,
    1024,
    65535,
  );
  if (portRangeMin >= portRangeMax) {
    issues.push("`portRangeMin` must be lower than `portRangeMax`.");
  }

  const controlPassword = parseNonEmptyString(
    input.controlPassword ?? env.CONTROL_PASSWORD,
    "controlPassword",
    issues,
    "",
  );
  if (!controlPassword) {
    issues.push(
      "`controlPassword` is required (input `controlPassword` or env `CONTROL_PASSWORD`).",
    );
  }

  const controlTimeoutMs = parseIntegerWithRangeValidation(
    input.controlTimeoutMs ?? env.CONTROL_TIMEOUT_MS,
    "controlTimeoutMs",
    issues,
    10000,
    100,
    120000,
  );

  const runtimeUnreachableThreshold = parseIntegerWithRangeValidation(
    input.runtimeUnreachableThreshold ?? env.RUNTIME_UNREACHABLE_THRESHOLD,
    "runtimeUnreachableThreshold",
    issues,
    3,
    1,
    100,
  );

  const incidentWebhookUrl = parseHttpUrl(
    input.incidentWebhookUrl ?? env.INCIDENT_WEBHOOK_URL,
    "incidentWebhookUrl",
    issues,
  );

  const logRedactionEnabled = parseBooleanWithValidation(
    input.logRedactionEnabled ?? env.LOG_REDACTION_ENABLED,
    "logRedactionEnabled",
    issues,
    true,
  );

  const shutdownDrainTimeoutMs = parseIntegerWithRangeValidation(
    input.shutdownDrainTimeoutMs ?? env.SHUTDOWN_DRAIN_TIMEOUT_MS,
    "shutdownDrainTimeoutMs",
    issues,
    20000,
    1000,
    600000,
  );

  const exitWhenIdle = parseBooleanWithValidation(
    input.exitWhenIdle ?? env.EXIT_WHEN_IDLE,
    "exitWhenIdle",
    issues,
    false,
  );

  const datasetIncludeBody = parseBooleanWithValidation(
    input.datasetIncludeBody ?? env.DATASET_INCLUDE_BODY,
    "datasetIncludeBody",
    issues,
    true,
  );

  let jobs: unknown[] = [];
  if (input.jobs !== undefined) {
    if (Array.isArray(input.jobs)) {
      jobs = input.jobs;
    } else {
      issues.push("`jobs` must be an array of job submissions.");
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    host,
    port,
    logLevel,
    poolMinSize,
    poolMaxSize,
    checkoutTimeoutMs,
    nodeCreationCooldownMs,
    startupProbeAttempts,
    startupProbeIntervalMs,
    healthProbeIntervalMs,
    healthProbeTimeoutMs,
    healthProbeUrl,
    rotationMaxAgeMs,
    rotationFailureThreshold,
    retireFailureThreshold,
    retireQuarantineCeilingMs,
    strictPolicyHosts,
    requestTimeoutMs,
    backoffBaseMs,
    backoffCapMs,
    backoffJitterMs,
    exhaustedRequeueDelayMs,
    dispatchWorkers,
    defaultMaxAttempts,
    sinkHandoffTimeoutMs,
    jobRetention,
    dockerBinary,
    dockerImage,
    dockerCommandTimeoutMs,
    portRangeMin,
    portRangeMax,
    controlPassword,
    controlTimeoutMs,
    runtimeUnreachableThreshold,
    incidentWebhookUrl,
    logRedactionEnabled,
    shutdownDrainTimeoutMs,
    exitWhenIdle,
    datasetIncludeBody,
    jobs,
  };
};
