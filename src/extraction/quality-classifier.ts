import type { Candidate, Quality, StreamFormat, StreamLink } from "./types";

export const QUALITY_RANK: Readonly<Record<Quality, number>> = {
  "4K": 5,
  "1080p": 4,
  "720p": 3,
  "480p": 2,
  "360p": 1,
  Unknown: 0,
};

interface QualityToken {
  quality: Exclude<Quality, "Unknown">;
  pattern: RegExp;
}

// Ordered highest first so a segment carrying two tokens resolves upward.
const QUALITY_TOKENS: readonly QualityToken[] = [
  { quality: "4K", pattern: /(?:^|[^a-z0-9])(?:4k|2160p|uhd)(?=$|[^a-z0-9])/i },
  { quality: "1080p", pattern: /(?:^|[^a-z0-9])(?:1080p|fhd|fullhd)(?=$|[^a-z0-9])/i },
  { quality: "720p", pattern: /(?:^|[^a-z0-9])720p(?=$|[^a-z0-9])/i },
  { quality: "480p", pattern: /(?:^|[^a-z0-9])480p(?=$|[^a-z0-9])/i },
  { quality: "360p", pattern: /(?:^|[^a-z0-9])360p(?=$|[^a-z0-9])/i },
];

const EXTENSION_FORMATS: Readonly<Record<string, StreamFormat>> = {
  mp4: "MP4",
  m3u8: "M3U8",
  mkv: "MKV",
  avi: "AVI",
  webm: "WebM",
};

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

export const matchQualityToken = (text: string): Quality | null => {
  for (const token of QUALITY_TOKENS) {
    if (token.pattern.test(text)) return token.quality;
  }
  return null;
};

const heightToQuality = (height: number): Quality | undefined => {
  if (!Number.isFinite(height)) return undefined;
  if (height >= 2160) return "4K";
  if (height >= 1080) return "1080p";
  if (height >= 720) return "720p";
  if (height >= 480) return "480p";
  if (height >= 360) return "360p";
  return undefined;
};

/**
 * Reads a player descriptor such as `label: "720p"`, `res: 1080`,
 * `quality: "Full HD"` or `height: 480` into a quality.
 */
export const parseQualityHint = (value: unknown): Quality | undefined => {
  if (typeof value === "number") return heightToQuality(value);
  if (typeof value !== "string") return undefined;

  const trimmed = value.trim();
  if (!trimmed) return undefined;

  const token = matchQualityToken(trimmed) ?? matchQualityToken(trimmed.replace(/\s+/g, ""));
  if (token) return token;

  const numeric = trimmed.match(/^(\d{3,4})\s*p?$/i);
  if (numeric) return heightToQuality(Number(numeric[1]));

  const upper = trimmed.toUpperCase();
  if (upper === "HD") return "720p";
  if (upper === "SD") return "480p";
  return undefined;
};

const pathSegments = (url: string): string[] => {
  try {
    return safeDecode(new URL(url).pathname).split("/").filter(Boolean);
  } catch {
    return [];
  }
};

/** Filename first, then directories from deepest to shallowest. */
export const qualityFromPath = (url: string): Quality | null => {
  const segments = pathSegments(url);
  for (let index = segments.length - 1; index >= 0; index -= 1) {
    const match = matchQualityToken(segments[index]);
    if (match) return match;
  }
  return null;
};

export const detectFormat = (url: string, formatHint?: StreamFormat): StreamFormat => {
  const segments = pathSegments(url);
  const filename = (segments.at(-1) ?? "").toLowerCase();
  const extension = filename.match(/\.([a-z0-9]+)$/)?.[1];
  if (extension && EXTENSION_FORMATS[extension]) return EXTENSION_FORMATS[extension];

  const lower = url.toLowerCase();
  if (lower.includes(".m3u8") || segments.some((segment) => segment.toLowerCase() === "hls")) {
    return "M3U8";
  }
  return formatHint ?? "Unknown";
};

export const classify = (candidate: Candidate): StreamLink => {
  const quality = qualityFromPath(candidate.rawUrl) ?? candidate.qualityHint ?? "Unknown";
  return {
    url: candidate.rawUrl,
    format: detectFormat(candidate.rawUrl, candidate.formatHint),
    quality,
    qualityRank: QUALITY_RANK[quality],
    validated: false,
    discoveryMethod: candidate.discoveryMethod,
    depth: candidate.depth,
    sourcePageUrl: candidate.sourcePageUrl,
    contentType: null,
    sizeBytes: null,
  };
};

/** Stable: equal links keep their discovery order. */
export const rankLinks = (links: readonly StreamLink[]): StreamLink[] =>
  [...links].sort((a, b) => {
    if (a.qualityRank !== b.qualityRank) return b.qualityRank - a.qualityRank;
    if (a.validated !== b.validated) return a.validated ? -1 : 1;
    return 0;
  });
