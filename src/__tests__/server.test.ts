import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "@jest/globals";
import type { ExtractionOutcome } from "../extraction/types";
import { RateLimitedError } from "../runtime/errors";
import { createApiServer, type ExtractionJob, type ServerRuntimeState } from "../server";

const EPISODE = "https://phimmoi.net/phim/x/tap-1/";

interface Harness {
  baseUrl: string;
  jobs: ExtractionJob[];
  setShuttingDown: (value: boolean) => void;
}

const outcomeFor = (job: ExtractionJob): ExtractionOutcome => ({
  request: { sourceUrl: job.url, requesterId: job.requesterId, requestedAt: "2026-01-01T00:00:00.000Z" },
  links: [
    {
      url: "https://cdn.example/720p/video.mp4",
      format: "MP4",
      quality: "720p",
      qualityRank: 3,
      validated: true,
      discoveryMethod: "direct",
      depth: 0,
      sourcePageUrl: job.url,
      contentType: "video/mp4",
      sizeBytes: null,
    },
  ],
  partial: false,
  warnings: [],
  stats: { pagesFetched: 1, framesSkipped: 0, candidatesFound: 1, duplicatesDropped: 0, rejectedByHost: 0 },
  latencyMs: 12,
  stageLatencyMs: { root_fetch_ms: 5 },
});

let server: Server | null = null;

const start = async (
  auth: { apiKeyEnabled: boolean; apiKey: string | null } = { apiKeyEnabled: false, apiKey: null },
  extract: (job: ExtractionJob) => Promise<ExtractionOutcome> = async (job) => outcomeFor(job),
): Promise<Harness> => {
  const jobs: ExtractionJob[] = [];
  let shuttingDown = false;
  const state: ServerRuntimeState = {
    getQueueStats: () => ({ accepting: true, queued: 0, inflight: 0, completed: 0, failed: 0 }),
    getSupportedDomains: () => ["phimmoi.net"],
    isShuttingDown: () => shuttingDown,
    enqueueExtraction: async (job) => {
      jobs.push(job);
      return extract(job);
    },
  };

  const created = createApiServer(
    { host: "127.0.0.1", port: 0, requestBodyMaxBytes: 4096, extractionTimeoutMs: 30000, ...auth },
    state,
  );
  server = created;
  await new Promise<void>((resolve) => created.listen(0, "127.0.0.1", resolve));

  const address = created.address();
  if (address === null || typeof address === "string") throw new Error("Server has no TCP address.");
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    jobs,
    setShuttingDown: (value) => {
      shuttingDown = value;
    },
  };
};

const postJson = async (url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> =>
  fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });

const readJson = async (response: Response): Promise<unknown> => response.json();

afterEach(async () => {
  const current = server;
  server = null;
  if (!current) return;
  current.closeAllConnections();
  await new Promise<void>((resolve) => current.close(() => resolve()));
});

describe("createApiServer", () => {
  it("answers health checks with request and trace ids", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/v1/health`, { headers: { "x-trace-id": "trace-abc" } });

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toMatch(/^req_[0-9a-f-]{36}$/);
    expect(response.headers.get("x-trace-id")).toBe("trace-abc");
    expect(await readJson(response)).toMatchObject({
      ok: true,
      data: { status: "ok", api_key_enabled: false },
      error: null,
      meta: { version: "0.1.0", trace_id: "trace-abc" },
    });
  });

  it("lists the supported domains", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/v1/domains`);

    expect(await readJson(response)).toMatchObject({ ok: true, data: { domains: ["phimmoi.net"] } });
  });

  it("runs an extraction and returns snake_case links", async () => {
    const { baseUrl, jobs } = await start();

    const response = await postJson(`${baseUrl}/v1/extract`, {
      url: EPISODE,
      requester_id: "chat-1",
      validate_links: true,
    });

    expect(response.status).toBe(200);
    expect(jobs).toEqual([
      { url: EPISODE, requesterId: "chat-1", validateLinks: true, timeoutMs: 30000 },
    ]);
    expect(await readJson(response)).toMatchObject({
      ok: true,
      data: {
        source_url: EPISODE,
        requester_id: "chat-1",
        partial: false,
        links: [
          {
            url: "https://cdn.example/720p/video.mp4",
            format: "MP4",
            quality: "720p",
            quality_rank: 3,
            validated: true,
            discovery_method: "direct",
            depth: 0,
            source_page_url: EPISODE,
            content_type: "video/mp4",
            size_bytes: null,
          },
        ],
        stats: { pages_fetched: 1, candidates_found: 1 },
        latency_ms: 12,
      },
      meta: { queue_depth: 0, queue_inflight: 0, timeout_ms: 30000 },
    });
  });

  it("falls back to the client address as requester", async () => {
    const { baseUrl, jobs } = await start();

    await postJson(`${baseUrl}/v1/extract`, { url: EPISODE }, { "x-forwarded-for": "203.0.113.9, 10.0.0.1" });

    expect(jobs.map((job) => job.requesterId)).toEqual(["ip:203.0.113.9"]);
  });

  it("requires the API key outside the public routes", async () => {
    const { baseUrl, jobs } = await start({ apiKeyEnabled: true, apiKey: "test-secret" });

    expect((await fetch(`${baseUrl}/v1/health`)).status).toBe(200);

    const missing = await fetch(`${baseUrl}/v1/domains`);
    expect(missing.status).toBe(401);
    expect(missing.headers.get("x-error-code")).toBe("AUTH_REQUIRED");

    const wrong = await fetch(`${baseUrl}/v1/domains`, { headers: { "x-api-key": "wrong-secret" } });
    expect(wrong.status).toBe(401);
    expect(await readJson(wrong)).toMatchObject({ ok: false, error: { code: "AUTH_INVALID" } });

    const accepted = await postJson(`${baseUrl}/v1/extract`, { url: EPISODE }, { authorization: "Bearer test-secret" });
    expect(accepted.status).toBe(200);
    expect(jobs.map((job) => job.requesterId)).toEqual(["key:9caf06bb4436"]);
  });

  it("maps rate limiting to 429 with retry-after in seconds", async () => {
    const { baseUrl } = await start(undefined, async () => {
      throw new RateLimitedError({ retry_after_ms: 1500, limit: 2, window_ms: 60000 });
    });

    const response = await postJson(`${baseUrl}/v1/extract`, { url: EPISODE });

    expect(response.status).toBe(429);
    expect(response.headers.get("retry-after")).toBe("2");
    expect(await readJson(response)).toMatchObject({
      ok: false,
      data: null,
      error: { code: "RATE_LIMITED", retryable: true, details: { retry_after_ms: 1500 } },
    });
  });

  it("rejects invalid payloads before queueing", async () => {
    const { baseUrl, jobs } = await start();

    const missingUrl = await postJson(`${baseUrl}/v1/extract`, {});
    expect(missingUrl.status).toBe(400);
    expect(await readJson(missingUrl)).toMatchObject({
      error: { code: "VALIDATION_ERROR", details: { issues: ["/ missing required field 'url'."] } },
    });

    const notJson = await postJson(`${baseUrl}/v1/extract`, "{url:");
    expect(await readJson(notJson)).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Request body must be valid JSON." },
    });
    expect(jobs).toEqual([]);
  });

  it("answers unknown routes with 404", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/v1/nope`);

    expect(response.status).toBe(404);
    expect(await readJson(response)).toMatchObject({
      error: { code: "NOT_FOUND", message: "Route not found: GET /v1/nope" },
    });
  });

  it("exposes Prometheus metrics", async () => {
    const { baseUrl } = await start();
    await fetch(`${baseUrl}/v1/health`);

    const response = await fetch(`${baseUrl}/v1/metrics`);
    const lines = (await response.text()).split("\n");

    expect(response.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(lines).toContain('stream_api_http_requests_total{method="GET",path="/v1/health",status="200"} 1');
    expect(lines).toContain('stream_api_build_info{version="0.1.0"} 1');
    expect(lines).toContain("stream_api_queue_depth 0");
    expect(lines).toContain("stream_api_queue_inflight 0");
  });

  it("refuses extractions while shutting down", async () => {
    const { baseUrl, jobs, setShuttingDown } = await start();
    setShuttingDown(true);

    const response = await postJson(`${baseUrl}/v1/extract`, { url: EPISODE });

    expect(response.status).toBe(503);
    expect(response.headers.get("x-error-code")).toBe("SHUTTING_DOWN");
    expect(jobs).toEqual([]);
  });
});
