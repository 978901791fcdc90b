import Ajv, { type ErrorObject } from "ajv";
import type { JobSubmission } from "../dispatch/types";
import { ValidationError } from "../runtime/errors";
import { buildJobRequestSchema } from "./contracts";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const formatAjvError = (error: ErrorObject): string => {
  const location = error.instancePath || "/";
  if (error.keyword === "required" && typeof error.params.missingProperty === "string") {
    return `${location} missing required field '${error.params.missingProperty}'.`;
  }
  if (error.keyword === "additionalProperties" && typeof error.params.additionalProperty === "string") {
    return `${location} has unknown field '${error.params.additionalProperty}'.`;
  }
  return `${location} ${error.message ?? "is invalid"}.`;
};

const normalizeJobRequest = (payload: Record<string, unknown>): JobSubmission => {
  const targetUrl = typeof payload.target_url === "string" ? payload.target_url.trim() : "";
  try {
    new URL(targetUrl);
  } catch {
    throw new ValidationError("`target_url` must be an absolute http(s) URL.", { target_url: targetUrl });
  }

  return {
    targetUrl,
    priority: typeof payload.priority === "number" ? payload.priority : undefined,
    maxAttempts: typeof payload.max_attempts === "number" ? payload.max_attempts : undefined,
    metadata: isRecord(payload.metadata) ? { ...payload.metadata } : undefined,
  };
};

export const createJobRequestValidator = () => {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
  });
  const validate = ajv.compile(buildJobRequestSchema());

  return (input: unknown): JobSubmission => {
    // Surrounding whitespace is not part of the URL; strip it before the pattern sees it.
    const payload =
      isRecord(input) && typeof input.target_url === "string"
        ? { ...input, target_url: input.target_url.trim() }
        : input;
    if (!validate(payload) || !isRecord(payload)) {
      const issues = (validate.errors ?? []).map(formatAjvError);
      throw new ValidationError("Job request failed schema validation.", {
        schema: "JobRequestV1",
        issues,
      });
    }

    return normalizeJobRequest(payload);
  };
};
