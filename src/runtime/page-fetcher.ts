import log from "@apify/log";
import { DEFAULT_PAGE_HEADERS, DEFAULT_USER_AGENTS } from "../constants";
import { type AdaptiveRetryConfig, abortableSleep, executeWithAdaptiveRetry } from "../reliability/retry-policy";
import { isPublicUrl } from "../security/domain-validator";
import { FetchError } from "./errors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchResult {
  url: string;
  finalUrl: string;
  httpStatus: number;
  body: string;
  contentType: string | null;
  elapsedMs: number;
  attempts: number;
  redirects: number;
}

export interface PageFetcherConfig {
  timeoutMs: number;
  maxRedirects: number;
  retry: AdaptiveRetryConfig;
  userAgents?: readonly string[];
  headers?: Readonly<Record<string, string>>;
  /** Bytes read from a page body before the rest is cancelled. Defaults to 5 MiB. */
  maxBodyBytes?: number;
  /** Minimum spacing between request starts to one host. 0 turns pacing off. */
  minHostIntervalMs?: number;
  fetchImpl?: FetchLike;
  isAllowedUrl?: (url: string) => boolean;
  random?: () => number;
  now?: () => number;
}

export interface PageFetchOptions {
  signal?: AbortSignal;
  referer?: string | null;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const ERROR_SNIPPET_BYTES = 64 * 1024;
const HOST_SLOT_PRUNE_THRESHOLD = 256;

const TEXT_CONTENT_TYPE = /^(?:text\/|application\/(?:[\w.-]+\+)?(?:json|xml|javascript|x-javascript|ecmascript)\b)/i;

/** A missing header counts as text; servers that omit it mostly serve HTML. */
export const isTextContentType = (contentType: string | null): boolean =>
  contentType === null || contentType.trim() === "" || TEXT_CONTENT_TYPE.test(contentType.trim());

export const parseRetryAfter = (value: string | null, now = Date.now()): number | null => {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
};

const discardBody = async (response: Response): Promise<void> => {
  try {
    await response.body?.cancel();
  } catch {
    // body already consumed or stream errored; nothing left to release
  }
};

/** Decodes at most `maxBytes` of the body as UTF-8 and cancels the rest of the stream. */
const readCappedText = async (response: Response, maxBytes: number): Promise<string> => {
  if (!response.body) return "";
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = "";
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    const room = maxBytes - received;
    if (chunk.byteLength >= room) {
      text += decoder.decode(chunk.subarray(0, room), { stream: true });
      await reader.cancel();
      break;
    }
    received += chunk.byteLength;
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
};

const hostKey = (url: string): string => new URL(url).hostname.toLowerCase();

/**
 * GETs a page with browser-like headers, manual redirect following and
 * retries per the injected retry policy. Every attempt has its own timeout;
 * the caller's signal bounds the whole call, backoff waits included.
 *
 * Only text bodies are read, and only up to `maxBodyBytes`. Requests to the
 * same host start at least `minHostIntervalMs` apart; that wait counts
 * against the attempt's timeout.
 */
export class PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly retry: AdaptiveRetryConfig;
  private readonly userAgents: readonly string[];
  private readonly headers: Readonly<Record<string, string>>;
  private readonly maxBodyBytes: number;
  private readonly minHostIntervalMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly isAllowedUrl: (url: string) => boolean;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly nextSlotByHost = new Map<string, number>();

  public constructor(config: PageFetcherConfig) {
    this.timeoutMs = Math.max(1, config.timeoutMs);
    this.maxRedirects = Math.max(0, config.maxRedirects);
    this.retry = config.retry;
    this.userAgents = config.userAgents && config.userAgents.length > 0 ? config.userAgents : DEFAULT_USER_AGENTS;
    this.headers = config.headers ?? DEFAULT_PAGE_HEADERS;
    this.maxBodyBytes = Math.max(1, config.maxBodyBytes ?? 5 * 1024 * 1024);
    this.minHostIntervalMs = Math.max(0, config.minHostIntervalMs ?? 0);
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.isAllowedUrl = config.isAllowedUrl ?? isPublicUrl;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
  }

  public async fetch(url: string, options: PageFetchOptions = {}): Promise<FetchResult> {
    const started = Date.now();
    let attempts = 0;

    const result = await executeWithAdaptiveRetry(
      this.retry,
      async (attempt) => {
        attempts = attempt;
        return this.attempt(url, options);
      },
      {
        signal: options.signal,
        random: this.random,
        onRetry: (ctx) => {
          log.warning("Page fetch failed; retrying.", {
            url,
            attempt: ctx.attempt,
            maxAttempts: ctx.maxAttempts,
            category: ctx.category,
            delayMs: ctx.delayMs,
            error: ctx.error instanceof Error ? ctx.error.message : String(ctx.error),
          });
        },
      },
    );

    return {
      ...result,
      url,
      elapsedMs: Date.now() - started,
      attempts,
    };
  }

  private pickUserAgent(): string {
    const index = Math.floor(this.random() * this.userAgents.length) % this.userAgents.length;
    return this.userAgents[index];
  }

  /** Reserves the next start slot for the URL's host and waits for it. */
  private async waitForHostSlot(url: string, signal: AbortSignal): Promise<void> {
    if (this.minHostIntervalMs === 0) return;
    const host = hostKey(url);
    const now = this.now();
    const slot = Math.max(now, this.nextSlotByHost.get(host) ?? 0);
    this.nextSlotByHost.set(host, slot + this.minHostIntervalMs);

    if (this.nextSlotByHost.size > HOST_SLOT_PRUNE_THRESHOLD) {
      for (const [knownHost, nextSlot] of this.nextSlotByHost) {
        if (nextSlot <= now) this.nextSlotByHost.delete(knownHost);
      }
    }

    const wait = slot - now;
    if (wait > 0) await abortableSleep(wait, signal);
  }

  private async attempt(
    url: string,
    options: PageFetchOptions,
  ): Promise<Omit<FetchResult, "url" | "elapsedMs" | "attempts">> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onParentAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener("abort", onParentAbort, { once: true });

    const headers: Record<string, string> = {
      ...this.headers,
      "user-agent": this.pickUserAgent(),
    };
    if (options.referer) headers.referer = options.referer;

    let current = url;
    let redirects = 0;
    try {
      for (;;) {
        if (!this.isAllowedUrl(current)) {
          throw new FetchError({
            kind: "http_error",
            url: current,
            message: "Refusing to fetch a non-public or non-http address.",
            details: { reason: "blocked_address" },
          });
        }

        await this.waitForHostSlot(current, controller.signal);
        const response = await this.fetchImpl(current, {
          method: "GET",
          redirect: "manual",
          signal: controller.signal,
          headers,
        });

        if (REDIRECT_STATUSES.has(response.status)) {
          const location = response.headers.get("location");
          await discardBody(response);
          if (!location) {
            throw new FetchError({
              kind: "http_error",
              url: current,
              status: response.status,
              message: `Redirect without location header (HTTP ${response.status}).`,
            });
          }
          if (redirects >= this.maxRedirects) {
            throw new FetchError({
              kind: "http_error",
              url: current,
              status: response.status,
              message: `Too many redirects (max ${this.maxRedirects}).`,
            });
          }
          current = new URL(location, current).toString();
          redirects += 1;
          continue;
        }

        const contentType = response.headers.get("content-type");
        const textual = isTextContentType(contentType);

        if (!response.ok) {
          const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
          let bodySnippet: string | null = null;
          if (textual) {
            bodySnippet = await readCappedText(response, ERROR_SNIPPET_BYTES);
          } else {
            await discardBody(response);
          }
          throw new FetchError({
            kind: "http_error",
            url: current,
            status: response.status,
            retryAfterMs,
            bodySnippet,
            message: `Target page answered HTTP ${response.status}.`,
          });
        }

        if (!textual) {
          await discardBody(response);
          throw new FetchError({
            kind: "http_error",
            url: current,
            status: response.status,
            message: `Target answered with non-text content (${contentType}).`,
            details: { reason: "non_text_content", content_type: contentType },
          });
        }

        return {
          finalUrl: current,
          httpStatus: response.status,
          body: await readCappedText(response, this.maxBodyBytes),
          contentType,
          redirects,
        };
      }
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (controller.signal.aborted) {
        throw new FetchError({
          kind: "timeout",
          url: current,
          message: timedOut
            ? `Target page fetch timed out after ${this.timeoutMs}ms.`
            : "Target page fetch was cancelled by the extraction deadline.",
          details: { timeout_ms: this.timeoutMs, cancelled: !timedOut },
        });
      }
      throw new FetchError({
        kind: "connection_failed",
        url: current,
        message: `Connection to target failed: ${error instanceof Error ? error.message : String(error)}`,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onParentAbort);
    }
  }
}
