export const API_VERSION = "0.1.0";

export interface EndpointContract {
  method: "GET" | "POST";
  path: string;
  summary: string;
}

export const OPERATION_ENDPOINTS: EndpointContract[] = [
  { method: "GET", path: "/v1", summary: "Endpoint index" },
  { method: "GET", path: "/v1/health", summary: "Liveness check" },
  { method: "GET", path: "/v1/ready", summary: "Readiness: accepting work and container runtime reachable" },
  { method: "GET", path: "/v1/pool", summary: "Exit node pool snapshot" },
  { method: "POST", path: "/v1/jobs", summary: "Submit a scrape job" },
  { method: "GET", path: "/v1/jobs/:id", summary: "Scrape job status" },
  { method: "GET", path: "/v1/metrics", summary: "Prometheus metrics exposition" },
  { method: "GET", path: "/v1/incidents", summary: "Recent process-health incidents" },
];

export const JOB_PRIORITY_RANGE = { min: -1000, max: 1000 } as const;
export const JOB_MAX_ATTEMPTS_RANGE = { min: 1, max: 50 } as const;

export const buildJobRequestSchema = (): Record<string, unknown> => ({
  $id: "JobRequestV1",
  type: "object",
  additionalProperties: false,
  required: ["target_url"],
  properties: {
    target_url: {
      type: "string",
      minLength: 1,
      maxLength: 4096,
      pattern: "^[Hh][Tt][Tt][Pp][Ss]?://",
    },
    priority: {
      type: "integer",
      minimum: JOB_PRIORITY_RANGE.min,
      maximum: JOB_PRIORITY_RANGE.max,
    },
    max_attempts: {
      type: "integer",
      minimum: JOB_MAX_ATTEMPTS_RANGE.min,
      maximum: JOB_MAX_ATTEMPTS_RANGE.max,
    },
    metadata: {
      type: "object",
    },
  },
});
