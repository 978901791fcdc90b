export type AppErrorCode =
  | "POOL_EXHAUSTED"
  | "POOL_SHUTTING_DOWN"
  | "NODE_CREATION_FAILED"
  | "REQUEST_TIMEOUT"
  | "REQUEST_FAILED"
  | "CONTROL_COMMAND_FAILED"
  | "RUNTIME_UNAVAILABLE"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "SHUTTING_DOWN"
  | "INTERNAL_ERROR";

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown> | null;

  public constructor(params: {
    code: AppErrorCode;
    message: string;
    statusCode: number;
    retryable?: boolean;
    details?: Record<string, unknown> | null;
  }) {
    super(params.message);
    this.name = "AppError";
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.retryable = params.retryable ?? false;
    this.details = params.details ?? null;
  }
}

/** No ready node could be lent before the checkout deadline. Jobs are requeued, not failed. */
export class PoolExhaustedError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "POOL_EXHAUSTED",
      message: "No exit node became available before the checkout timeout.",
      statusCode: 503,
      retryable: true,
      details: details ?? null,
    });
    this.name = "PoolExhaustedError";
  }
}

export class PoolShuttingDownError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "POOL_SHUTTING_DOWN",
      message: "Exit node pool is draining and does not lend nodes.",
      statusCode: 503,
      retryable: false,
      details: details ?? null,
    });
    this.name = "PoolShuttingDownError";
  }
}

export class NodeCreationFailedError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "NODE_CREATION_FAILED",
      message,
      statusCode: 503,
      retryable: true,
      details: details ?? null,
    });
    this.name = "NodeCreationFailedError";
  }
}

export class RequestTimeoutError extends AppError {
  public constructor(timeoutMs: number, details?: Record<string, unknown>) {
    super({
      code: "REQUEST_TIMEOUT",
      message: `Outbound request timed out after ${timeoutMs}ms.`,
      statusCode: 504,
      retryable: true,
      details: { timeoutMs, ...details },
    });
    this.name = "RequestTimeoutError";
  }
}

export class RequestFailedError extends AppError {
  public readonly httpStatus: number | null;
  public readonly blocked: boolean;

  public constructor(
    message: string,
    params: { httpStatus?: number | null; blocked?: boolean; details?: Record<string, unknown> } = {},
  ) {
    super({
      code: "REQUEST_FAILED",
      message,
      statusCode: 502,
      retryable: true,
      details: {
        httpStatus: params.httpStatus ?? null,
        blocked: params.blocked ?? false,
        ...params.details,
      },
    });
    this.name = "RequestFailedError";
    this.httpStatus = params.httpStatus ?? null;
    this.blocked = params.blocked ?? false;
  }
}

export class ControlCommandError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "CONTROL_COMMAND_FAILED",
      message,
      statusCode: 502,
      retryable: true,
      details: details ?? null,
    });
    this.name = "ControlCommandError";
  }
}

/** The container runtime itself cannot be reached (missing binary, daemon down). */
export class RuntimeUnavailableError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "RUNTIME_UNAVAILABLE",
      message,
      statusCode: 503,
      retryable: true,
      details: details ?? null,
    });
    this.name = "RuntimeUnavailableError";
  }
}

export class ValidationError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "VALIDATION_ERROR",
      message,
      statusCode: 400,
      retryable: false,
      details: details ?? null,
    });
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "NOT_FOUND",
      message,
      statusCode: 404,
      retryable: false,
      details: details ?? null,
    });
    this.name = "NotFoundError";
  }
}

export class ShuttingDownError extends AppError {
  public constructor() {
    super({
      code: "SHUTTING_DOWN",
      message: "Service is shutting down. New jobs are not accepted.",
      statusCode: 503,
      retryable: true,
      details: null,
    });
    this.name = "ShuttingDownError";
  }
}

export const normalizeError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  if (error instanceof Error) {
    return new AppError({
      code: "INTERNAL_ERROR",
      message: error.message,
      statusCode: 500,
      retryable: false,
      details: null,
    });
  }

  return new AppError({
    code: "INTERNAL_ERROR",
    message: "Unknown error.",
    statusCode: 500,
    retryable: false,
    details: null,
  });
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
