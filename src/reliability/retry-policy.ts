import { AppError, RequestFailedError } from "../runtime/errors";

export type FailureCategory = "timeout" | "network" | "blocked" | "http" | "internal";

export interface BackoffConfig {
  baseDelayMs: number;
  capDelayMs: number;
  jitterWindowMs: number;
}

const NETWORK_MARKERS = [
  "network",
  "econnreset",
  "econnrefused",
  "enotfound",
  "ehostunreach",
  "socket hang up",
  "fetch failed",
  "proxy",
];

export const classifyFailure = (error: unknown): FailureCategory => {
  if (error instanceof RequestFailedError) {
    if (error.blocked) return "blocked";
    if (error.httpStatus !== null) return "http";
    return "network";
  }
  if (error instanceof AppError) {
    if (error.code === "REQUEST_TIMEOUT") return "timeout";
    if (error.code === "INTERNAL_ERROR") return "internal";
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (error.name === "AbortError" || message.includes("timeout") || message.includes("timed out")) {
      return "timeout";
    }
    if (NETWORK_MARKERS.some((marker) => message.includes(marker))) return "network";
  }

  return "internal";
};

/**
 * `min(base * 2^attempt, cap) + uniform(0, jitterWindow)`.
 * With a fixed `random`, the result never decreases as `attempt` grows.
 */
export const computeBackoffDelay = (
  config: BackoffConfig,
  attempt: number,
  random: () => number = Math.random,
): number => {
  const exponent = Math.max(0, attempt);
  const scaled = config.baseDelayMs * Math.pow(2, exponent);
  const capped = Math.min(scaled, config.capDelayMs);
  const jitter = config.jitterWindowMs > 0 ? random() * config.jitterWindowMs : 0;
  return Math.floor(capped + jitter);
};

export interface RetryDecision {
  retry: boolean;
  category: FailureCategory;
  delayMs: number;
}

/** `attempt` is the attempt counter after it was incremented for this failure. */
export const decideRetry = (
  config: BackoffConfig,
  error: unknown,
  attempt: number,
  maxAttempts: number,
  random: () => number = Math.random,
): RetryDecision => {
  const category = classifyFailure(error);
  const retry = attempt < Math.max(1, maxAttempts);
  return {
    retry,
    category,
    delayMs: retry ? computeBackoffDelay(config, attempt, random) : 0,
  };
};
