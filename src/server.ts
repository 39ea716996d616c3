import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { createHash, randomUUID } from "node:crypto";
import log from "@apify/log";
import { API_VERSION } from "./api/contracts";
import { createMeta, createSuccessEnvelope } from "./api/envelope";
import { createExtractRequestValidator, type ExtractRequestInput } from "./api/schema-validation";
import { serializeOutcome } from "./api/serialize";
import type { ExtractionOutcome } from "./extraction/types";
import { MetricsRegistry } from "./observability/metrics";
import { annotateExtraction, getRequestContext, runWithRequestContext } from "./observability/request-context";
import {
  AuthInvalidError,
  AuthRequiredError,
  NotFoundError,
  ShuttingDownError,
  ValidationError,
  normalizeError,
  toErrorBody,
} from "./runtime/errors";
import type { RequestQueueStats } from "./runtime/request-queue";
import type { RuntimeConfig } from "./types";

export interface ExtractionJob extends ExtractRequestInput {
  requesterId: string;
}

export interface ServerRuntimeState {
  getQueueStats: () => RequestQueueStats;
  getSupportedDomains: () => string[];
  isShuttingDown: () => boolean;
  enqueueExtraction: (job: ExtractionJob) => Promise<ExtractionOutcome>;
  metrics?: MetricsRegistry;
}

type ServerOptions = Pick<
  RuntimeConfig,
  "host" | "port" | "apiKeyEnabled" | "apiKey" | "requestBodyMaxBytes" | "extractionTimeoutMs"
>;

const json = (res: ServerResponse, statusCode: number, body: unknown): void => {
  res.statusCode = statusCode;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
};

const text = (res: ServerResponse, statusCode: number, body: string): void => {
  res.statusCode = statusCode;
  res.setHeader("content-type", "text/plain; version=0.0.4; charset=utf-8");
  res.end(body);
};

const describeMetrics = (metrics: MetricsRegistry): void => {
  metrics.describe("stream_api_http_requests_total", "HTTP requests by method, path and status.");
  metrics.describe("stream_api_http_errors_total", "HTTP error responses by error code.");
  metrics.describe("stream_api_http_request_duration_ms", "HTTP request duration in milliseconds.");
  metrics.describe("stream_extractions_total", "Completed extractions by outcome.");
  metrics.describe("stream_extraction_errors_total", "Failed extractions by error code.");
  metrics.describe("stream_links_returned_total", "Stream links returned to callers.");
  metrics.describe("stream_extraction_latency_ms", "End-to-end extraction latency in milliseconds.");
};

const sendError = (
  metrics: MetricsRegistry,
  res: ServerResponse,
  requestId: string,
  error: unknown,
  metaExtras: Record<string, unknown> = {},
): void => {
  const appError = normalizeError(error);
  res.setHeader("x-error-code", appError.code);
  if (appError.code === "RATE_LIMITED") {
    const retryAfterMs = appError.details?.retry_after_ms;
    if (typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs) && retryAfterMs > 0) {
      res.setHeader("retry-after", String(Math.ceil(retryAfterMs / 1000)));
    }
  }
  if (appError.code === "INTERNAL_ERROR") {
    log.exception(error instanceof Error ? error : new Error(String(error)), "Unhandled request failure.");
  }

  const ctx = getRequestContext();
  if (ctx) {
    metrics.inc("stream_api_http_errors_total", {
      method: ctx.http_method,
      path: ctx.http_path,
      code: appError.code,
    });
    if (ctx.source_url) {
      metrics.inc("stream_extraction_errors_total", { code: appError.code });
    }
  }

  json(res, appError.statusCode, toErrorBody(appError, createMeta(requestId, metaExtras)));
};

const readRawBody = async (
  req: IncomingMessage,
  options: { maxBytes: number; required?: boolean },
): Promise<string> => {
  const chunks: Buffer[] = [];
  let size = 0;

  await new Promise<void>((resolve, reject) => {
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > options.maxBytes) {
        reject(
          new ValidationError("Request body exceeds max size.", {
            max_bytes: options.maxBytes,
          }),
        );
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve());
    req.on("error", reject);
  });

  if (chunks.length === 0) {
    if (options.required === false) return "";
    throw new ValidationError("Request body is required.");
  }

  return Buffer.concat(chunks).toString("utf8");
};

const readJsonBody = async (req: IncomingMessage, maxBytes: number): Promise<unknown> => {
  const raw = await readRawBody(req, { maxBytes });
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new ValidationError("Request body must be valid JSON.");
  }
};

const extractClientApiKey = (req: IncomingMessage): string | null => {
  const xApiKey = req.headers["x-api-key"];
  if (typeof xApiKey === "string" && xApiKey.trim().length > 0) {
    return xApiKey.trim();
  }

  const auth = req.headers.authorization;
  if (typeof auth === "string") {
    const match = auth.match(/^Bearer\s+(.+)$/i);
    if (match && match[1].trim().length > 0) {
      return match[1].trim();
    }
  }

  return null;
};

const toClientKeyId = (apiKey: string): string =>
  createHash("sha256").update(apiKey, "utf8").digest("hex").slice(0, 12);

const extractTraceId = (req: IncomingMessage): string => {
  const value = req.headers["x-trace-id"];
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim().slice(0, 128);
  }
  return `trace_${randomUUID()}`;
};

const isPublicRoute = (method: string, path: string): boolean =>
  method === "GET" && (path === "/v1/health" || path === "/v1/ready");

const extractClientIp = (req: IncomingMessage): string => {
  const forwarded = req.headers["x-forwarded-for"];
  if (typeof forwarded === "string" && forwarded.trim().length > 0) {
    return forwarded.split(",")[0].trim();
  }
  return req.socket.remoteAddress ?? "unknown";
};

const ensureAuthorized = (options: ServerOptions, req: IncomingMessage, path: string): void => {
  if (!options.apiKeyEnabled) return;
  if (isPublicRoute(req.method ?? "GET", path)) return;

  const expected = options.apiKey;
  if (!expected) {
    throw new AuthRequiredError({
      reason: "API key auth is enabled but API key is not configured.",
    });
  }

  const provided = extractClientApiKey(req);
  if (!provided) {
    throw new AuthRequiredError({
      accepted_headers: ["x-api-key", "Authorization: Bearer <key>"],
    });
  }
  if (provided !== expected) {
    throw new AuthInvalidError({
      accepted_headers: ["x-api-key", "Authorization: Bearer <key>"],
    });
  }
};

const defaultRequesterId = (req: IncomingMessage): string => {
  const apiKey = extractClientApiKey(req);
  if (apiKey) return `key:${toClientKeyId(apiKey)}`;
  return `ip:${extractClientIp(req)}`;
};

const notFound = (req: IncomingMessage): NotFoundError =>
  new NotFoundError(`Route not found: ${req.method ?? "GET"} ${req.url ?? "/"}`, {
    path: req.url ?? "/",
    method: req.method ?? "GET",
  });

export const createApiServer = (options: ServerOptions, state: ServerRuntimeState): Server => {
  const startedAt = Date.now();
  const metrics = state.metrics ?? new MetricsRegistry();
  describeMetrics(metrics);

  const validateExtractRequest = createExtractRequestValidator({
    minMs: 1000,
    maxMs: options.extractionTimeoutMs,
    defaultMs: options.extractionTimeoutMs,
  });

  const handle = async (
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
    traceId: string,
  ): Promise<void> => {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://stream-link-resolver.local").pathname;

    ensureAuthorized(options, req, path);

    if (method === "GET" && path === "/v1/health") {
      json(
        res,
        200,
        createSuccessEnvelope(
          requestId,
          {
            status: "ok",
            uptime_s: Math.floor((Date.now() - startedAt) / 1000),
            api_key_enabled: options.apiKeyEnabled,
          },
          { trace_id: traceId },
        ),
      );
      return;
    }

    if (method === "GET" && path === "/v1/ready") {
      const queue = state.getQueueStats();
      json(
        res,
        200,
        createSuccessEnvelope(
          requestId,
          {
            ready: !state.isShuttingDown(),
            queue_depth: queue.queued,
            queue_inflight: queue.inflight,
            shutting_down: state.isShuttingDown(),
            host: options.host,
            port: options.port,
            timeout_policy: {
              extraction_default_ms: options.extractionTimeoutMs,
              extraction_max_ms: options.extractionTimeoutMs,
            },
          },
          { trace_id: traceId },
        ),
      );
      return;
    }

    if (method === "GET" && path === "/v1/domains") {
      json(
        res,
        200,
        createSuccessEnvelope(requestId, { domains: state.getSupportedDomains() }, { trace_id: traceId }),
      );
      return;
    }

    if (method === "GET" && path === "/v1/metrics") {
      const queue = state.getQueueStats();
      const extra = [
        `stream_api_build_info{version="${API_VERSION}"} 1`,
        `stream_api_uptime_seconds ${Math.floor((Date.now() - startedAt) / 1000)}`,
        `stream_api_queue_depth ${queue.queued}`,
        `stream_api_queue_inflight ${queue.inflight}`,
      ];
      text(res, 200, metrics.renderPrometheus(extra));
      return;
    }

    if (method === "POST" && path === "/v1/extract") {
      if (state.isShuttingDown()) {
        throw new ShuttingDownError();
      }

      const body = await readJsonBody(req, options.requestBodyMaxBytes);
      const extractRequest = validateExtractRequest(body);
      const requesterId = extractRequest.requesterId ?? defaultRequesterId(req);

      annotateExtraction(requesterId, extractRequest.url);

      const outcome = await state.enqueueExtraction({ ...extractRequest, requesterId });

      metrics.inc("stream_extractions_total", { outcome: outcome.partial ? "partial" : "ok" });
      metrics.inc("stream_links_returned_total", {}, outcome.links.length);
      metrics.observeMs(
        "stream_extraction_latency_ms",
        { outcome: outcome.partial ? "partial" : "ok" },
        outcome.latencyMs,
      );

      const queue = state.getQueueStats();
      json(
        res,
        200,
        createSuccessEnvelope(requestId, serializeOutcome(outcome), {
          trace_id: traceId,
          queue_depth: queue.queued,
          queue_inflight: queue.inflight,
          timeout_ms: extractRequest.timeoutMs,
        }),
      );
      return;
    }

    throw notFound(req);
  };

  return createServer((req, res) => {
    const requestId = `req_${randomUUID()}`;
    const traceId = extractTraceId(req);
    res.setHeader("x-request-id", requestId);
    res.setHeader("x-trace-id", traceId);

    const startedAtMs = Date.now();
    const path = new URL(req.url ?? "/", "http://stream-link-resolver.local").pathname;
    const method = req.method ?? "GET";
    const apiKey = extractClientApiKey(req);

    res.on("finish", () => {
      metrics.inc("stream_api_http_requests_total", {
        method,
        path,
        status: res.statusCode,
      });
      metrics.observeMs("stream_api_http_request_duration_ms", { method, path }, Date.now() - startedAtMs);
    });

    runWithRequestContext(
      {
        request_id: requestId,
        trace_id: traceId,
        http_method: method,
        http_path: path,
        client_ip: extractClientIp(req),
        client_key_present: Boolean(apiKey),
        client_key_id: apiKey ? toClientKeyId(apiKey) : null,
        requester_id: null,
        source_url: null,
        started_at_ms: startedAtMs,
      },
      () => {
        void handle(req, res, requestId, traceId).catch((error: unknown) => {
          sendError(metrics, res, requestId, error, {
            trace_id: traceId,
            path: req.url ?? "/",
            method: req.method ?? "GET",
          });
        });
      },
    );
  });
};
