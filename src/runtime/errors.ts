import { API_VERSION } from "../api/contracts";

export type AppErrorCode =
  | "AUTH_REQUIRED"
  | "AUTH_INVALID"
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "INVALID_URL"
  | "RATE_LIMITED"
  | "FETCH_FAILED"
  | "NO_LINKS_FOUND"
  | "QUEUE_BACKPRESSURE"
  | "QUEUE_CLOSED"
  | "QUEUE_TIMEOUT"
  | "INTERNAL_ERROR"
  | "SHUTTING_DOWN";

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

export type InvalidUrlKind = "malformed_url" | "unsupported_domain" | "homepage_not_allowed";

const INVALID_URL_MESSAGES: Record<InvalidUrlKind, string> = {
  malformed_url: "URL is malformed or uses an unsupported scheme.",
  unsupported_domain: "URL host is not in the supported domain list.",
  homepage_not_allowed: "URL points to a site homepage; an episode page link is required.",
};

export class InvalidUrlError extends AppError {
  public readonly kind: InvalidUrlKind;

  public constructor(kind: InvalidUrlKind, details?: Record<string, unknown>) {
    super({
      code: "INVALID_URL",
      message: INVALID_URL_MESSAGES[kind],
      statusCode: 400,
      retryable: false,
      details: { kind, ...(details ?? {}) },
    });
    this.name = "InvalidUrlError";
    this.kind = kind;
  }
}

export class RateLimitedError extends AppError {
  public constructor(details: Record<string, unknown> & { retry_after_ms: number }) {
    super({
      code: "RATE_LIMITED",
      message: "Too many extraction requests. Retry after the current window.",
      statusCode: 429,
      retryable: true,
      details,
    });
    this.name = "RateLimitedError";
  }
}

export type FetchErrorKind = "timeout" | "connection_failed" | "http_error";

export interface FetchErrorParams {
  kind: FetchErrorKind;
  url: string;
  message: string;
  status?: number | null;
  retryAfterMs?: number | null;
  /** Start of an error page's body; kept off the wire. */
  bodySnippet?: string | null;
  details?: Record<string, unknown>;
}

export class FetchError extends AppError {
  public readonly kind: FetchErrorKind;
  public readonly url: string;
  public readonly status: number | null;
  public readonly retryAfterMs: number | null;
  public readonly bodySnippet: string | null;

  public constructor(params: FetchErrorParams) {
    super({
      code: "FETCH_FAILED",
      message: params.message,
      statusCode: params.kind === "timeout" ? 504 : 502,
      retryable: params.kind !== "http_error" || (params.status ?? 0) >= 500 || params.status === 429,
      details: {
        kind: params.kind,
        url: params.url,
        status: params.status ?? null,
        ...(params.details ?? {}),
      },
    });
    this.name = "FetchError";
    this.kind = params.kind;
    this.url = params.url;
    this.status = params.status ?? null;
    this.retryAfterMs = params.retryAfterMs ?? null;
    this.bodySnippet = params.bodySnippet ?? null;
  }
}

export class NoLinksFoundError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "NO_LINKS_FOUND",
      message: "No stream links were found on the page.",
      statusCode: 404,
      retryable: false,
      details: details ?? null,
    });
    this.name = "NoLinksFoundError";
  }
}

export class AuthRequiredError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "AUTH_REQUIRED",
      message: "API key is required for this endpoint.",
      statusCode: 401,
      retryable: false,
      details: details ?? null,
    });
    this.name = "AuthRequiredError";
  }
}

export class AuthInvalidError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "AUTH_INVALID",
      message: "API key is invalid.",
      statusCode: 401,
      retryable: false,
      details: details ?? null,
    });
    this.name = "AuthInvalidError";
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

export class QueueBackpressureError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "QUEUE_BACKPRESSURE",
      message: "Request queue is full. Retry later.",
      statusCode: 429,
      retryable: true,
      details: details ?? null,
    });
    this.name = "QueueBackpressureError";
  }
}

export class QueueClosedError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "QUEUE_CLOSED",
      message: "Request queue is closed and not accepting new tasks.",
      statusCode: 503,
      retryable: true,
      details: details ?? null,
    });
    this.name = "QueueClosedError";
  }
}

export class QueueTimeoutError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "QUEUE_TIMEOUT",
      message: "Queued task exceeded timeout budget.",
      statusCode: 504,
      retryable: true,
      details: details ?? null,
    });
    this.name = "QueueTimeoutError";
  }
}

export class ShuttingDownError extends AppError {
  public constructor() {
    super({
      code: "SHUTTING_DOWN",
      message: "Service is shutting down. New requests are not accepted.",
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

export const toErrorBody = (
  error: unknown,
  metaOverrides: Record<string, unknown> = {},
) => {
  const appError = normalizeError(error);
  return {
    ok: false,
    data: null,
    error: {
      code: appError.code,
      message: appError.message,
      retryable: appError.retryable,
      details: appError.details,
    },
    meta: {
      request_id:
        typeof metaOverrides.request_id === "string" ? metaOverrides.request_id : null,
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      ...metaOverrides,
    },
  };
};
