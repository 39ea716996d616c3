import log from "@apify/log";
import { AsyncRequestQueue } from "../runtime/request-queue";
import type { FetchResult, PageFetchOptions } from "../runtime/page-fetcher";
import { isPublicUrl } from "../security/domain-validator";
import type { PatternExtractor } from "./pattern-extractor";
import type { Candidate } from "./types";
import { looksLikeStreamUrl, normalizedUrlKey } from "./url-utils";

export interface PageSource {
  fetch(url: string, options?: PageFetchOptions): Promise<FetchResult>;
}

export interface IframeResolverConfig {
  fetcher: PageSource;
  extractor: PatternExtractor;
  maxDepth: number;
  maxConcurrency: number;
  maxFramesPerPage: number;
  isAllowedUrl?: (url: string) => boolean;
  /** Decides which frames look like video players. Defaults to `isLikelyPlayerFrame`. */
  isPlayerFrame?: (url: string) => boolean;
}

export interface IframeResolutionContext {
  /** Pages already fetched (the root and where it redirected to); never fetched again. */
  seedUrls: readonly string[];
  signal?: AbortSignal;
}

export interface IframeResolution {
  candidates: Candidate[];
  pagesFetched: number;
  framesSkipped: number;
}

const FRAME_EXCLUDED_TOKENS: ReadonlySet<string> = new Set([
  "ad",
  "ads",
  "adserver",
  "analytics",
  "tracking",
  "pixel",
  "facebook",
  "twitter",
  "comment",
  "comments",
  "disqus",
  "share",
  "social",
  "doubleclick",
]);

const FRAME_PLAYER_MARKERS = [
  "player",
  "embed",
  "video",
  "stream",
  "play",
  "watch",
  "movie",
  "film",
  "tv",
  "episode",
  "show",
  "phim",
  "xem",
];

/** Short path tokens used by embed hosts, as in `/e/<id>` or `/v/<id>`. */
const FRAME_PLAYER_TOKENS: ReadonlySet<string> = new Set(["e", "v"]);

/**
 * Ads, trackers and social widgets are rejected first, whatever else the URL
 * says. Anything else must carry a player marker to be followed.
 */
export const isLikelyPlayerFrame = (url: string): boolean => {
  const lower = url.toLowerCase();
  const tokens = lower.split(/[^a-z0-9]+/).filter(Boolean);
  if (tokens.some((token) => FRAME_EXCLUDED_TOKENS.has(token))) return false;
  return (
    FRAME_PLAYER_MARKERS.some((marker) => lower.includes(marker)) ||
    tokens.some((token) => FRAME_PLAYER_TOKENS.has(token))
  );
};

interface ResolutionState {
  queue: AsyncRequestQueue;
  visited: Set<string>;
  signal?: AbortSignal;
  pagesFetched: number;
  framesSkipped: number;
}

/**
 * Follows frame candidates up to `maxDepth`, feeding each fetched frame
 * back through the pattern extractor. Only the fetches go through the
 * fan-out queue, so nested frames never wait on a slot their parent holds.
 */
export class IframeResolver {
  private readonly fetcher: PageSource;
  private readonly extractor: PatternExtractor;
  private readonly maxDepth: number;
  private readonly maxConcurrency: number;
  private readonly maxFramesPerPage: number;
  private readonly isAllowedUrl: (url: string) => boolean;
  private readonly isPlayerFrame: (url: string) => boolean;

  public constructor(config: IframeResolverConfig) {
    this.fetcher = config.fetcher;
    this.extractor = config.extractor;
    this.maxDepth = Math.max(0, config.maxDepth);
    this.maxConcurrency = Math.max(1, config.maxConcurrency);
    this.maxFramesPerPage = Math.max(1, config.maxFramesPerPage);
    this.isAllowedUrl = config.isAllowedUrl ?? isPublicUrl;
    this.isPlayerFrame = config.isPlayerFrame ?? isLikelyPlayerFrame;
  }

  public async resolveIframes(
    frames: readonly Candidate[],
    context: IframeResolutionContext,
  ): Promise<IframeResolution> {
    const state: ResolutionState = {
      queue: new AsyncRequestQueue({ concurrency: this.maxConcurrency, name: "iframe-fanout" }),
      visited: new Set(context.seedUrls.map(normalizedUrlKey)),
      signal: context.signal,
      pagesFetched: 0,
      framesSkipped: 0,
    };

    const candidates = await this.resolvePageFrames(frames, state);
    return {
      candidates,
      pagesFetched: state.pagesFetched,
      framesSkipped: state.framesSkipped,
    };
  }

  /**
   * Frames to fetch, in page order. A frame whose URL is already a stream
   * comes back as a stream candidate of the embedding page instead.
   */
  private selectFrames(frames: readonly Candidate[], state: ResolutionState): Candidate[] {
    const selected: Candidate[] = [];
    let followed = 0;
    for (const frame of frames) {
      if (frame.kind !== "frame") continue;

      const key = normalizedUrlKey(frame.rawUrl);
      if (state.visited.has(key)) continue;

      if (looksLikeStreamUrl(frame.rawUrl)) {
        state.visited.add(key);
        selected.push({
          ...frame,
          kind: "stream",
          discoveryMethod: "iframe",
          depth: Math.max(0, frame.depth - 1),
        });
        continue;
      }
      if (frame.depth > this.maxDepth) {
        state.framesSkipped += 1;
        log.debug("Frame beyond depth limit; not following.", {
          frameUrl: frame.rawUrl,
          depth: frame.depth,
          maxDepth: this.maxDepth,
        });
        continue;
      }
      if (!this.isAllowedUrl(frame.rawUrl)) {
        state.framesSkipped += 1;
        log.warning("Frame points at a non-public address; not following.", { frameUrl: frame.rawUrl });
        continue;
      }
      if (!this.isPlayerFrame(frame.rawUrl)) {
        state.framesSkipped += 1;
        log.debug("Frame does not look like a player; not following.", { frameUrl: frame.rawUrl });
        continue;
      }
      if (followed >= this.maxFramesPerPage) {
        state.framesSkipped += 1;
        continue;
      }

      state.visited.add(key);
      followed += 1;
      selected.push(frame);
    }
    return selected;
  }

  private async resolvePageFrames(frames: readonly Candidate[], state: ResolutionState): Promise<Candidate[]> {
    const selected = this.selectFrames(frames, state);
    if (selected.length === 0) return [];

    const perFrame = await Promise.all(
      selected.map(async (frame) => (frame.kind === "stream" ? [frame] : this.resolveFrame(frame, state))),
    );
    return perFrame.flat();
  }

  private async resolveFrame(frame: Candidate, state: ResolutionState): Promise<Candidate[]> {
    if (state.signal?.aborted) {
      state.framesSkipped += 1;
      return [];
    }

    let page: FetchResult;
    try {
      page = await state.queue.enqueue(async () =>
        this.fetcher.fetch(frame.rawUrl, { signal: state.signal, referer: frame.sourcePageUrl }),
      );
    } catch (error) {
      state.framesSkipped += 1;
      log.warning("Frame fetch failed; skipping frame.", {
        frameUrl: frame.rawUrl,
        depth: frame.depth,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    state.pagesFetched += 1;
    state.visited.add(normalizedUrlKey(page.finalUrl));

    const found = this.extractor.extract(page.body, page.finalUrl, frame.depth);
    const streams = found
      .filter((candidate) => candidate.kind === "stream")
      .map((candidate): Candidate => ({ ...candidate, discoveryMethod: "iframe" }));
    const nested = await this.resolvePageFrames(
      found.filter((candidate) => candidate.kind === "frame"),
      state,
    );

    return [...streams, ...nested];
  }
}
