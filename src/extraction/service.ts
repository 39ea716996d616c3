import log from "@apify/log";
import { serializeStats } from "../api/serialize";
import { FetchError, NoLinksFoundError, RateLimitedError } from "../runtime/errors";
import type { FetchResult } from "../runtime/page-fetcher";
import type { DomainValidator } from "../security/domain-validator";
import type { FixedWindowRateLimiter } from "../security/rate-limiter";
import { detectChallengeSignals } from "./challenge-detection";
import { IframeResolver, type PageSource } from "./iframe-resolver";
import type { LinkValidator } from "./link-validator";
import { PatternExtractor } from "./pattern-extractor";
import { classify, rankLinks } from "./quality-classifier";
import type {
  Candidate,
  ExtractLinksOptions,
  ExtractionOutcome,
  ExtractionRequest,
  ExtractionStats,
  StreamLink,
} from "./types";
import { hostOf, normalizedUrlKey } from "./url-utils";

export const PARTIAL_RESULT_WARNING = "partial_result";

export interface StreamExtractionServiceConfig {
  limiter: FixedWindowRateLimiter;
  domainValidator: DomainValidator;
  fetcher: PageSource;
  extractor?: PatternExtractor;
  linkValidator?: LinkValidator | null;
  iframeMaxDepth: number;
  iframeMaxConcurrency: number;
  iframeMaxPerPage: number;
  extractionTimeoutMs: number;
  linkValidationEnabled: boolean;
  maxLinks: number;
}

/** Re-raises a root fetch failure, annotated with challenge signals when the error page shows some. */
const explainRootFailure = (error: unknown): unknown => {
  if (!(error instanceof FetchError) || error.kind !== "http_error" || error.status === null) return error;

  const challenge = detectChallengeSignals({
    html: error.bodySnippet ?? "",
    url: error.url,
    statusCode: error.status,
  });
  if (!challenge.blocked) return error;

  log.info("Root page fetch was blocked.", { url: error.url, status: error.status, challenge: challenge.kind });
  return new FetchError({
    kind: error.kind,
    url: error.url,
    status: error.status,
    retryAfterMs: error.retryAfterMs,
    message: error.message,
    details: { challenge },
  });
};

const dedupeCandidates = (candidates: readonly Candidate[]): { unique: Candidate[]; dropped: number } => {
  const byKey = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const key = normalizedUrlKey(candidate.rawUrl);
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, { ...candidate });
      continue;
    }
    if (!existing.qualityHint && candidate.qualityHint) existing.qualityHint = candidate.qualityHint;
    if (!existing.formatHint && candidate.formatHint) existing.formatHint = candidate.formatHint;
  }
  return { unique: [...byKey.values()], dropped: candidates.length - byKey.size };
};

/**
 * Resolves one episode page into ranked stream links: rate limit, domain
 * check, root fetch, pattern extraction, frame recursion, dedupe,
 * classification, host filter, optional probing, ordering and cap.
 *
 * Only the rate limit, the domain check and the root fetch fail the call.
 * When the deadline fires later on, whatever was classified so far comes
 * back with `partial: true`.
 */
export class StreamExtractionService {
  private readonly limiter: FixedWindowRateLimiter;
  private readonly domainValidator: DomainValidator;
  private readonly fetcher: PageSource;
  private readonly extractor: PatternExtractor;
  private readonly iframeResolver: IframeResolver;
  private readonly linkValidator: LinkValidator | null;
  private readonly extractionTimeoutMs: number;
  private readonly linkValidationEnabled: boolean;
  private readonly maxLinks: number;

  public constructor(config: StreamExtractionServiceConfig) {
    this.limiter = config.limiter;
    this.domainValidator = config.domainValidator;
    this.fetcher = config.fetcher;
    this.extractor = config.extractor ?? new PatternExtractor();
    this.iframeResolver = new IframeResolver({
      fetcher: config.fetcher,
      extractor: this.extractor,
      maxDepth: config.iframeMaxDepth,
      maxConcurrency: config.iframeMaxConcurrency,
      maxFramesPerPage: config.iframeMaxPerPage,
    });
    this.linkValidator = config.linkValidator ?? null;
    this.extractionTimeoutMs = Math.max(1, config.extractionTimeoutMs);
    this.linkValidationEnabled = config.linkValidationEnabled;
    this.maxLinks = Math.max(1, config.maxLinks);
  }

  public supportedDomains(): string[] {
    return this.domainValidator.supportedDomains();
  }

  public async extractLinks(
    rawUrl: string,
    requesterId: string,
    options: ExtractLinksOptions = {},
  ): Promise<ExtractionOutcome> {
    const started = Date.now();
    const stageLatencyMs: Record<string, number> = {};
    const requester = requesterId.trim() || "anonymous";

    const decision = this.limiter.allow(requester);
    if (!decision.allowed) {
      throw new RateLimitedError({
        retry_after_ms: decision.retryAfterMs,
        limit: decision.limit,
        window_ms: decision.windowMs,
      });
    }

    const validationStarted = Date.now();
    const target = this.domainValidator.validate(rawUrl);
    stageLatencyMs.validation_ms = Date.now() - validationStarted;

    const request: ExtractionRequest = Object.freeze({
      sourceUrl: target.url,
      requesterId: requester,
      requestedAt: new Date(started).toISOString(),
    });

    const timeoutMs =
      typeof options.timeoutMs === "number" && options.timeoutMs > 0
        ? Math.min(options.timeoutMs, this.extractionTimeoutMs)
        : this.extractionTimeoutMs;
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), timeoutMs);
    const signal = deadline.signal;

    try {
      const rootFetchStarted = Date.now();
      let root: FetchResult;
      try {
        root = await this.fetcher.fetch(target.url, { signal });
      } catch (error) {
        throw explainRootFailure(error);
      }
      stageLatencyMs.root_fetch_ms = Date.now() - rootFetchStarted;

      const warnings: string[] = [];
      const finalHost = hostOf(root.finalUrl);
      if (finalHost && !this.domainValidator.isAllowedHost(finalHost)) {
        warnings.push(`root_redirected_offsite:${finalHost}`);
      }

      const extractStarted = Date.now();
      const rootCandidates = this.extractor.extract(root.body, root.finalUrl, 0);
      stageLatencyMs.extract_ms = Date.now() - extractStarted;

      const iframeStarted = Date.now();
      const resolution = await this.iframeResolver.resolveIframes(
        rootCandidates.filter((candidate) => candidate.kind === "frame"),
        { seedUrls: [target.url, root.finalUrl], signal },
      );
      stageLatencyMs.iframe_ms = Date.now() - iframeStarted;

      const streams = [
        ...rootCandidates.filter((candidate) => candidate.kind === "stream"),
        ...resolution.candidates,
      ];

      const classifyStarted = Date.now();
      const { unique, dropped } = dedupeCandidates(streams);
      const classified = unique.map(classify);
      const accepted = classified.filter((link) => this.passesHostFilter(link));
      stageLatencyMs.classify_ms = Date.now() - classifyStarted;

      const stats: ExtractionStats = {
        pagesFetched: 1 + resolution.pagesFetched,
        framesSkipped: resolution.framesSkipped,
        candidatesFound: streams.length,
        duplicatesDropped: dropped,
        rejectedByHost: classified.length - accepted.length,
      };

      let links = accepted;
      const shouldValidate = options.validateLinks ?? this.linkValidationEnabled;
      if (shouldValidate && this.linkValidator && !signal.aborted && links.length > 0) {
        const probeStarted = Date.now();
        links = await this.linkValidator.validateAll(links, { signal });
        stageLatencyMs.link_validation_ms = Date.now() - probeStarted;
      }

      const ranked = rankLinks(links)
        .slice(0, this.maxLinks)
        .map((link): StreamLink => Object.freeze(link));

      const partial = signal.aborted;
      if (partial) warnings.push(PARTIAL_RESULT_WARNING);

      const latencyMs = Date.now() - started;
      stageLatencyMs.extraction_total_ms = latencyMs;

      if (ranked.length === 0) {
        const challenge = detectChallengeSignals({
          html: root.body,
          url: root.finalUrl,
          statusCode: root.httpStatus,
        });
        log.info("Stream extraction found no links.", {
          sourceUrl: target.url,
          partial,
          challenge: challenge.kind,
          ...stats,
        });
        throw new NoLinksFoundError({
          source_url: target.url,
          partial,
          warnings,
          challenge,
          stats: serializeStats(stats),
        });
      }

      log.info("Stream extraction completed.", {
        sourceUrl: target.url,
        links: ranked.length,
        partial,
        latencyMs,
        ...stats,
      });

      return {
        request,
        links: ranked,
        partial,
        warnings,
        stats,
        latencyMs,
        stageLatencyMs,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private passesHostFilter(link: StreamLink): boolean {
    if (link.format !== "Unknown") return true;
    const host = hostOf(link.url);
    return host !== null && this.domainValidator.isAllowedHost(host);
  }
}
