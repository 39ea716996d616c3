import type { ExtractionOutcome, ExtractionStats, StreamLink } from "../extraction/types";

export const serializeStats = (stats: ExtractionStats) => ({
  pages_fetched: stats.pagesFetched,
  frames_skipped: stats.framesSkipped,
  candidates_found: stats.candidatesFound,
  duplicates_dropped: stats.duplicatesDropped,
  rejected_by_host: stats.rejectedByHost,
});

export const serializeLink = (link: StreamLink) => ({
  url: link.url,
  format: link.format,
  quality: link.quality,
  quality_rank: link.qualityRank,
  validated: link.validated,
  discovery_method: link.discoveryMethod,
  depth: link.depth,
  source_page_url: link.sourcePageUrl,
  content_type: link.contentType,
  size_bytes: link.sizeBytes,
});

export const serializeOutcome = (outcome: ExtractionOutcome) => ({
  source_url: outcome.request.sourceUrl,
  requester_id: outcome.request.requesterId,
  requested_at: outcome.request.requestedAt,
  links: outcome.links.map(serializeLink),
  partial: outcome.partial,
  warnings: outcome.warnings,
  stats: serializeStats(outcome.stats),
  latency_ms: outcome.latencyMs,
  stage_latency_ms: outcome.stageLatencyMs,
});
