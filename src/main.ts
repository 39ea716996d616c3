import { Actor } from "apify";
import log from "@apify/log";
import type { AddressInfo } from "node:net";
import { buildRuntimeConfig, ConfigValidationError } from "./config";
import { LinkValidator } from "./extraction/link-validator";
import { PatternExtractor } from "./extraction/pattern-extractor";
import { StreamExtractionService } from "./extraction/service";
import { installCorrelationLogging } from "./observability/correlation-log";
import { MetricsRegistry } from "./observability/metrics";
import { PageFetcher } from "./runtime/page-fetcher";
import { AsyncRequestQueue } from "./runtime/request-queue";
import { DomainValidator, isPublicUrl } from "./security/domain-validator";
import { FixedWindowRateLimiter } from "./security/rate-limiter";
import { createApiServer } from "./server";
import type { ActorInput } from "./types";

// Headroom for queue bookkeeping on top of the extraction deadline.
const QUEUE_TIMEOUT_MARGIN_MS = 5_000;

const closeServer = async (server: ReturnType<typeof createApiServer>): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const run = async (): Promise<void> => {
  await Actor.init();

  const input = (await Actor.getInput<ActorInput>()) ?? {};
  const runtime = buildRuntimeConfig(input);

  log.setLevel(log.LEVELS[runtime.logLevel]);
  installCorrelationLogging(log, true);

  const domainValidator = new DomainValidator({
    supportedDomains: runtime.supportedDomains,
    minPathSegments: runtime.minPathSegments,
  });
  const limiter = new FixedWindowRateLimiter({
    windowMs: runtime.rateLimitWindowMs,
    limit: runtime.rateLimitMax,
  });
  const fetcher = new PageFetcher({
    timeoutMs: runtime.fetchTimeoutMs,
    maxRedirects: runtime.fetchMaxRedirects,
    minHostIntervalMs: runtime.fetchMinHostIntervalMs,
    retry: {
      maxAttempts: runtime.retryMaxAttempts,
      baseDelayMs: runtime.retryBaseDelayMs,
      maxDelayMs: runtime.retryMaxDelayMs,
      throttledDelayMs: Math.min(runtime.retryMaxDelayMs, runtime.retryBaseDelayMs * 2),
      jitterMs: runtime.retryJitterMs,
    },
    userAgents: runtime.userAgents,
    isAllowedUrl: isPublicUrl,
  });
  const linkValidator = new LinkValidator({
    timeoutMs: runtime.linkValidationTimeoutMs,
    concurrency: runtime.iframeMaxConcurrency,
    userAgent: runtime.userAgents[0],
    isAllowedUrl: isPublicUrl,
  });
  const extractionService = new StreamExtractionService({
    limiter,
    domainValidator,
    fetcher,
    extractor: new PatternExtractor(),
    linkValidator,
    iframeMaxDepth: runtime.iframeMaxDepth,
    iframeMaxConcurrency: runtime.iframeMaxConcurrency,
    iframeMaxPerPage: runtime.iframeMaxPerPage,
    extractionTimeoutMs: runtime.extractionTimeoutMs,
    linkValidationEnabled: runtime.linkValidationEnabled,
    maxLinks: runtime.maxLinks,
  });

  const requestQueue = new AsyncRequestQueue({
    name: "extract",
    concurrency: runtime.requestQueueConcurrency,
    maxSize: runtime.requestQueueMaxSize,
    taskTimeoutMs: runtime.extractionTimeoutMs + QUEUE_TIMEOUT_MARGIN_MS,
  });

  let shuttingDown = false;

  const server = createApiServer(runtime, {
    getQueueStats: () => requestQueue.getStats(),
    getSupportedDomains: () => extractionService.supportedDomains(),
    isShuttingDown: () => shuttingDown,
    metrics: new MetricsRegistry(),
    enqueueExtraction: async (job) =>
      requestQueue.enqueue(async () =>
        extractionService.extractLinks(job.url, job.requesterId, {
          validateLinks: job.validateLinks ?? undefined,
          timeoutMs: job.timeoutMs,
        }),
      ),
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(runtime.port, runtime.host, () => resolve());
  });

  const address = server.address();
  const listening: AddressInfo | null = address !== null && typeof address === "object" ? address : null;
  log.info("Stream link resolver started", {
    host: runtime.host,
    port: listening?.port ?? runtime.port,
    logLevel: runtime.logLevel,
    supportedDomains: runtime.supportedDomains.length,
    apiKeyEnabled: runtime.apiKeyEnabled,
    rateLimitWindowMs: runtime.rateLimitWindowMs,
    rateLimitMax: runtime.rateLimitMax,
    fetchTimeoutMs: runtime.fetchTimeoutMs,
    extractionTimeoutMs: runtime.extractionTimeoutMs,
    iframeMaxDepth: runtime.iframeMaxDepth,
    iframeMaxConcurrency: runtime.iframeMaxConcurrency,
    linkValidationEnabled: runtime.linkValidationEnabled,
    maxLinks: runtime.maxLinks,
    queueConcurrency: runtime.requestQueueConcurrency,
    queueMaxSize: runtime.requestQueueMaxSize,
    listeningAddress: listening?.address ?? runtime.host,
  });

  const shutdown = async (reason: "aborting" | "migrating" | "signal"): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    requestQueue.pause();
    log.warning("Shutdown started.", { reason });

    await closeServer(server);

    try {
      await requestQueue.drain(runtime.shutdownDrainTimeoutMs);
    } catch (error) {
      log.warning("Queue drain timed out during shutdown.", {
        reason,
        timeoutMs: runtime.shutdownDrainTimeoutMs,
        error: messageOf(error),
      });
    }
  };

  Actor.on("aborting", async () => {
    await shutdown("aborting");
    await Actor.exit();
  });

  Actor.on("migrating", async () => {
    await shutdown("migrating");
  });

  process.on("SIGINT", () => {
    void shutdown("signal").then(async () => {
      await Actor.exit();
    });
  });
  process.on("SIGTERM", () => {
    void shutdown("signal").then(async () => {
      await Actor.exit();
    });
  });
};

run().catch(async (error: unknown) => {
  if (error instanceof ConfigValidationError) {
    log.error("Actor bootstrap failed due to invalid configuration.", {
      issues: error.issues,
    });
    await Actor.fail(error.message);
    return;
  }

  log.exception(error instanceof Error ? error : new Error(messageOf(error)), "Actor bootstrap failed");
  await Actor.fail(messageOf(error));
});
