import type { AppError, AppErrorCode } from "../runtime/errors";
import { API_VERSION } from "./contracts";

export interface ApiMeta {
  request_id: string;
  timestamp: string;
  version: string;
  [key: string]: unknown;
}

export interface SuccessEnvelope<T> {
  ok: true;
  data: T;
  error: null;
  meta: ApiMeta;
}

export interface ErrorEnvelope {
  ok: false;
  data: null;
  error: {
    code: AppErrorCode;
    message: string;
    retryable: boolean;
    details: Record<string, unknown> | null;
  };
  meta: ApiMeta;
}

const createMeta = (requestId: string, extras: Record<string, unknown>): ApiMeta => ({
  request_id: requestId,
  timestamp: new Date().toISOString(),
  version: API_VERSION,
  ...extras,
});

export const createSuccessEnvelope = <T>(
  requestId: string,
  data: T,
  metaExtras: Record<string, unknown> = {},
): SuccessEnvelope<T> => ({
  ok: true,
  data,
  error: null,
  meta: createMeta(requestId, metaExtras),
});

/** `retryable` tells an operator whether sending the same request later can succeed. */
export const createErrorEnvelope = (
  requestId: string,
  error: AppError,
  metaExtras: Record<string, unknown> = {},
): ErrorEnvelope => ({
  ok: false,
  data: null,
  error: {
    code: error.code,
    message: error.message,
    retryable: error.retryable,
    details: error.details,
  },
  meta: createMeta(requestId, metaExtras),
});
