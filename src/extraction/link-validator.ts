import log from "@apify/log";
import { DEFAULT_USER_AGENTS } from "../constants";
import type { FetchLike } from "../runtime/page-fetcher";
import { AsyncRequestQueue } from "../runtime/request-queue";
import { isPublicUrl } from "../security/domain-validator";
import type { StreamLink } from "./types";

export interface LinkValidatorConfig {
  timeoutMs: number;
  concurrency: number;
  fetchImpl?: FetchLike;
  userAgent?: string;
  isAllowedUrl?: (url: string) => boolean;
}

export interface ProbeResult {
  valid: boolean;
  status: number | null;
  method: "HEAD" | "GET";
  contentType: string | null;
  sizeBytes: number | null;
  error: string | null;
}

const METHOD_FALLBACK_STATUSES = new Set([405, 501]);

const parseSize = (response: Response): number | null => {
  const range = response.headers.get("content-range");
  const total = range?.match(/\/(\d+)\s*$/)?.[1];
  if (total) return Number(total);

  if (response.status === 206) return null;
  const length = response.headers.get("content-length");
  if (length && /^\d+$/.test(length.trim())) return Number(length.trim());
  return null;
};

const release = async (response: Response): Promise<void> => {
  try {
    await response.body?.cancel();
  } catch {
    // nothing left to release
  }
};

export class LinkValidator {
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;
  private readonly isAllowedUrl: (url: string) => boolean;

  public constructor(config: LinkValidatorConfig) {
    this.timeoutMs = Math.max(1, config.timeoutMs);
    this.concurrency = Math.max(1, config.concurrency);
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENTS[0];
    this.isAllowedUrl = config.isAllowedUrl ?? isPublicUrl;
  }

  /**
   * HEAD without following redirects; a ranged GET for servers that refuse
   * HEAD. Never throws: failures come back as `valid: false`.
   */
  public async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const failed = (method: ProbeResult["method"], error: string, status: number | null = null): ProbeResult => ({
      valid: false,
      status,
      method,
      contentType: null,
      sizeBytes: null,
      error,
    });

    if (!this.isAllowedUrl(url)) return failed("HEAD", "blocked_address");
    if (signal?.aborted) return failed("HEAD", "aborted");

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onParentAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onParentAbort, { once: true });

    let method: ProbeResult["method"] = "HEAD";
    try {
      let response = await this.fetchImpl(url, {
        method: "HEAD",
        redirect: "manual",
        signal: controller.signal,
        headers: { "user-agent": this.userAgent },
      });

      if (METHOD_FALLBACK_STATUSES.has(response.status)) {
        await release(response);
        method = "GET";
        response = await this.fetchImpl(url, {
          method: "GET",
          redirect: "manual",
          signal: controller.signal,
          headers: { "user-agent": this.userAgent, range: "bytes=0-1023" },
        });
      }

      const result: ProbeResult = {
        valid: response.status >= 200 && response.status < 400,
        status: response.status,
        method,
        contentType: response.headers.get("content-type"),
        sizeBytes: parseSize(response),
        error: null,
      };
      await release(response);
      return result;
    } catch (error) {
      if (controller.signal.aborted) return failed(method, "timeout");
      return failed(method, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onParentAbort);
    }
  }

  public async validate(link: StreamLink, options: { signal?: AbortSignal } = {}): Promise<StreamLink> {
    const probe = await this.probe(link.url, options.signal);
    if (!probe.valid) {
      log.debug("Stream link probe failed; keeping link unvalidated.", {
        url: link.url,
        method: probe.method,
        status: probe.status,
        error: probe.error,
      });
      return { ...link, validated: false };
    }

    return {
      ...link,
      validated: true,
      contentType: probe.contentType ?? link.contentType,
      sizeBytes: probe.sizeBytes ?? link.sizeBytes,
    };
  }

  /** Probes every link with bounded concurrency, preserving input order. */
  public async validateAll(
    links: readonly StreamLink[],
    options: { signal?: AbortSignal } = {},
  ): Promise<StreamLink[]> {
    const queue = new AsyncRequestQueue({ concurrency: this.concurrency, name: "link-validation" });
    return Promise.all(links.map(async (link) => queue.enqueue(async () => this.validate(link, options))));
  }
}
