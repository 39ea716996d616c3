import type { PageDocument, Quality, StrategyHit, StreamFormat } from "../types";
import { unescapeEmbeddedUrl } from "../url-utils";

const MIME_FORMATS: Record<string, StreamFormat> = {
  "application/x-mpegurl": "M3U8",
  "application/vnd.apple.mpegurl": "M3U8",
  "audio/mpegurl": "M3U8",
  "audio/x-mpegurl": "M3U8",
  "video/mp4": "MP4",
  "video/webm": "WebM",
  "video/x-matroska": "MKV",
  "video/x-msvideo": "AVI",
  "video/avi": "AVI",
  hls: "M3U8",
  mp4: "MP4",
};

const NON_VIDEO_EXTENSION = /\.(?:jpe?g|png|gif|svg|webp|ico|css|js|json|woff2?|ttf|vtt|srt|xml|html?|php)(?:$|[?#])/i;
const SCRIPT_BODY_PATTERN = /<script\b([^>]*)>([\s\S]*?)<\/script>/gi;

export const mimeToFormat = (value: string | undefined | null): StreamFormat | undefined => {
  if (!value) return undefined;
  const base = value.split(";")[0].trim().toLowerCase();
  return MIME_FORMATS[base];
};

/** True when the string is an absolute, protocol-relative or rooted URL. */
export const isUrlShaped = (value: string): boolean =>
  /^(?:https?:)?\/\/[^\s/]+/i.test(value) || /^\/[^/\s]/.test(value);

export const hasNonVideoExtension = (value: string): boolean => NON_VIDEO_EXTENSION.test(value);

export interface ScriptBlock {
  type: string | null;
  body: string;
}

/** Inline script bodies, skipping `<script src>` tags. Works with or without a parsed DOM. */
export const inlineScripts = (document: PageDocument): ScriptBlock[] => {
  const { $ } = document;
  if ($) {
    const blocks: ScriptBlock[] = [];
    $("script:not([src])").each((_, element) => {
      const node = $(element);
      blocks.push({ type: node.attr("type")?.trim().toLowerCase() ?? null, body: node.text() });
    });
    return blocks;
  }

  const blocks: ScriptBlock[] = [];
  for (const match of document.html.matchAll(SCRIPT_BODY_PATTERN)) {
    const attrs = match[1] ?? "";
    if (/\ssrc\s*=/i.test(attrs)) continue;
    const type = attrs.match(/\stype\s*=\s*["']?([^"'\s>]+)/i)?.[1]?.toLowerCase() ?? null;
    blocks.push({ type, body: match[2] ?? "" });
  }
  return blocks;
};

/** Collects hits in discovery order, keeping the first of equal URLs and filling hints it lacked. */
export class HitCollector {
  private readonly hits: StrategyHit[] = [];
  private readonly byUrl = new Map<string, StrategyHit>();

  public add(
    rawUrl: string | undefined | null,
    extra: { kind?: StrategyHit["kind"]; qualityHint?: Quality; formatHint?: StreamFormat } = {},
  ): void {
    if (!rawUrl) return;
    const url = unescapeEmbeddedUrl(rawUrl);
    if (!url) return;

    const existing = this.byUrl.get(url);
    if (existing) {
      if (!existing.qualityHint && extra.qualityHint) existing.qualityHint = extra.qualityHint;
      if (!existing.formatHint && extra.formatHint) existing.formatHint = extra.formatHint;
      return;
    }

    const hit: StrategyHit = { url };
    if (extra.kind) hit.kind = extra.kind;
    if (extra.qualityHint) hit.qualityHint = extra.qualityHint;
    if (extra.formatHint) hit.formatHint = extra.formatHint;
    this.byUrl.set(url, hit);
    this.hits.push(hit);
  }

  public toArray(): StrategyHit[] {
    return [...this.hits];
  }
}
