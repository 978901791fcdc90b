export type LogLevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface ActorInput {
  host?: string;
  port?: number | string;
  logLevel?: LogLevelName;
  poolMinSize?: number | string;
  poolMaxSize?: number | string;
  checkoutTimeoutMs?: number | string;
  nodeCreationCooldownMs?: number | string;
  startupProbeAttempts?: number | string;
  startupProbeIntervalMs?: number | string;
  healthProbeIntervalMs?: number | string;
  healthProbeTimeoutMs?: number | string;
  healthProbeUrl?: string;
  rotationMaxAgeMs?: number | string;
  rotationFailureThreshold?: number | string;
  retireFailureThreshold?: number | string;
  retireQuarantineCeilingMs?: number | string;
  strictPolicyHosts?: string[] | string;
  requestTimeoutMs?: number | string;
  backoffBaseMs?: number | string;
  backoffCapMs?: number | string;
  backoffJitterMs?: number | string;
  exhaustedRequeueDelayMs?: number | string;
  dispatchWorkers?: number | string;
  defaultMaxAttempts?: number | string;
  sinkHandoffTimeoutMs?: number | string;
  jobRetention?: number | string;
  dockerBinary?: string;
  dockerImage?: string;
  dockerCommandTimeoutMs?: number | string;
  portRangeMin?: number | string;
  portRangeMax?: number | string;
  controlPassword?: string;
  controlTimeoutMs?: number | string;
  runtimeUnreachableThreshold?: number | string;
  incidentWebhookUrl?: string;
  logRedactionEnabled?: boolean | string;
  shutdownDrainTimeoutMs?: number | string;
  exitWhenIdle?: boolean | string;
  datasetIncludeBody?: boolean | string;
  jobs?: unknown[];
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevelName;
  poolMinSize: number;
  poolMaxSize: number;
  checkoutTimeoutMs: number;
  nodeCreationCooldownMs: number;
  startupProbeAttempts: number;
  startupProbeIntervalMs: number;
  healthProbeIntervalMs: number;
  healthProbeTimeoutMs: number;
  healthProbeUrl: string;
  rotationMaxAgeMs: number;
  rotationFailureThreshold: number;
  retireFailureThreshold: number;
  retireQuarantineCeilingMs: number;
  strictPolicyHosts: string[];
  requestTimeoutMs: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  backoffJitterMs: number;
  exhaustedRequeueDelayMs: number;
  dispatchWorkers: number;
  defaultMaxAttempts: number;
  sinkHandoffTimeoutMs: number;
  jobRetention: number;
  dockerBinary: string;
  dockerImage: string;
  dockerCommandTimeoutMs: number;
  portRangeMin: number;
  portRangeMax: number;
  controlPassword: string;
  controlTimeoutMs: number;
  runtimeUnreachableThreshold: number;
  incidentWebhookUrl: string | null;
  logRedactionEnabled: boolean;
  shutdownDrainTimeoutMs: number;
  exitWhenIdle: boolean;
  datasetIncludeBody: boolean;
  jobs: unknown[];
}
