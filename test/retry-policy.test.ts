import { describe, expect, it } from "vitest";
import { classifyFailure, computeBackoffDelay, decideRetry } from "../src/reliability/retry-policy";
import { RequestFailedError, RequestTimeoutError, ShuttingDownError } from "../src/runtime/errors";

const backoff = { baseDelayMs: 100, capDelayMs: 1000, jitterWindowMs: 0 };

describe("computeBackoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(backoff, attempt))).toEqual([
      200, 400, 800, 1000, 1000,
    ]);
  });

  it("never decreases for a fixed random draw", () => {
    const config = { ...backoff, jitterWindowMs: 100 };
    const delays = Array.from({ length: 8 }, (_, attempt) => computeBackoffDelay(config, attempt, () => 0.5));

    expect(delays[0]).toBe(150);
    for (let index = 1; index < delays.length; index += 1) {
      expect(delays[index]).toBeGreaterThanOrEqual(delays[index - 1]);
    }
  });

  it("stays within the jitter window", () => {
    const config = { ...backoff, jitterWindowMs: 100 };
    expect(computeBackoffDelay(config, 10, () => 0)).toBe(1000);
    expect(computeBackoffDelay(config, 10, () => 0.999)).toBe(1099);
  });
});

describe("classifyFailure", () => {
  it("separates blocked, http and network request failures", () => {
    expect(classifyFailure(new RequestFailedError("Target answered HTTP 429.", { httpStatus: 429, blocked: true }))).toBe(
      "blocked",
    );
    expect(classifyFailure(new RequestFailedError("Target answered HTTP 500.", { httpStatus: 500 }))).toBe("http");
    expect(classifyFailure(new RequestFailedError("Request through exit node failed: fetch failed"))).toBe("network");
  });

  it("recognises timeouts", () => {
    expect(classifyFailure(new RequestTimeoutError(20))).toBe("timeout");
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyFailure(abort)).toBe("timeout");
  });

  it("falls back on message markers, then internal", () => {
    expect(classifyFailure(new Error("socket hang up"))).toBe("network");
    expect(classifyFailure(new Error("boom"))).toBe("internal");
    expect(classifyFailure(new ShuttingDownError())).toBe("internal");
    expect(classifyFailure("nope")).toBe("internal");
  });
});

describe("decideRetry", () => {
  const failure = new RequestFailedError("Target answered HTTP 500.", { httpStatus: 500 });

  it("retries while attempts remain", () => {
    expect(decideRetry(backoff, failure, 1, 3)).toEqual({ retry: true, category: "http", delayMs: 200 });
    expect(decideRetry(backoff, failure, 2, 3)).toEqual({ retry: true, category: "http", delayMs: 400 });
  });

  it("stops once the attempt budget is spent", () => {
    expect(decideRetry(backoff, failure, 3, 3)).toEqual({ retry: false, category: "http", delayMs: 0 });
    expect(decideRetry(backoff, failure, 1, 1)).toEqual({ retry: false, category: "http", delayMs: 0 });
  });
});
