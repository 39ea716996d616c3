import type { CheerioAPI } from "cheerio";

export type DiscoveryMethod = "direct" | "script" | "iframe";

export type CandidateKind = "stream" | "frame";

export type StreamFormat = "MP4" | "M3U8" | "MKV" | "AVI" | "WebM" | "Unknown";

export type Quality = "4K" | "1080p" | "720p" | "480p" | "360p" | "Unknown";

export interface ExtractionRequest {
  readonly sourceUrl: string;
  readonly requesterId: string;
  readonly requestedAt: string;
}

export interface Candidate {
  rawUrl: string;
  sourcePageUrl: string;
  discoveryMethod: DiscoveryMethod;
  depth: number;
  kind: CandidateKind;
  strategy: string;
  qualityHint?: Quality;
  formatHint?: StreamFormat;
}

export interface StreamLink {
  readonly url: string;
  readonly format: StreamFormat;
  readonly quality: Quality;
  readonly qualityRank: number;
  readonly validated: boolean;
  readonly discoveryMethod: DiscoveryMethod;
  readonly depth: number;
  readonly sourcePageUrl: string;
  readonly contentType: string | null;
  readonly sizeBytes: number | null;
}

/** What a strategy sees of one fetched page. `$` is null when structural parsing failed. */
export interface PageDocument {
  html: string;
  pageUrl: string;
  depth: number;
  $: CheerioAPI | null;
}

/** Candidate fields a strategy fills in; the extractor stamps the page, depth and strategy name. */
export interface StrategyHit {
  url: string;
  kind?: CandidateKind;
  qualityHint?: Quality;
  formatHint?: StreamFormat;
}

export interface ExtractionStrategy {
  readonly name: string;
  readonly discoveryMethod: DiscoveryMethod;
  extract(document: PageDocument): StrategyHit[];
}

export interface ChallengeDetectionResult {
  blocked: boolean;
  kind: "captcha" | "rate_limit" | "bot_check" | "js_challenge" | "unknown" | null;
  confidence: number;
  evidence: string[];
}

export interface ExtractionStats {
  pagesFetched: number;
  framesSkipped: number;
  candidatesFound: number;
  duplicatesDropped: number;
  rejectedByHost: number;
}

export interface ExtractionOutcome {
  request: ExtractionRequest;
  links: StreamLink[];
  partial: boolean;
  warnings: string[];
  stats: ExtractionStats;
  latencyMs: number;
  stageLatencyMs: Record<string, number>;
}

export interface ExtractLinksOptions {
  validateLinks?: boolean;
  timeoutMs?: number;
}
