import { parseQualityHint } from "../quality-classifier";
import type { ExtractionStrategy, PageDocument, StrategyHit } from "../types";
import { looksLikeStreamUrl, unescapeEmbeddedUrl } from "../url-utils";
import { HitCollector, hasNonVideoExtension, inlineScripts, isUrlShaped, mimeToFormat } from "./shared";

const QUOTED_STRING = /(["'`])((?:\\.|(?!\1)[^\\\r\n])*)\1/g;

// Player configuration keys whose value is a stream even without a file extension.
const PLAYER_KEYS =
  "file|videoUrl|video_url|streamUrl|stream_url|playUrl|play_url|hls|hlsUrl|hls_url|playlist|m3u8|mp4";
const GENERIC_KEYS = "src|source|url|link";

const KEYED_ASSIGNMENT = new RegExp(
  `(?:^|[^\\w$])["']?(${PLAYER_KEYS}|${GENERIC_KEYS})["']?\\s*[:=]\\s*(["'\`])((?:\\\\.|(?!\\2)[^\\\\\\r\\n])*)\\2`,
  "gi",
);
const PLAYER_KEY_SET = new Set(PLAYER_KEYS.toLowerCase().split("|"));

const SIBLING_HINT = /["']?\b(label|quality|res|resolution|height|type)\b["']?\s*:\s*(?:(["'])([^"'\r\n]*)\2|(\d+))/gi;
const QUALITY_KEYS = new Set(["label", "quality", "res", "resolution", "height"]);
const MAX_OBJECT_SPAN = 400;

/** The innermost `{...}` around `index`, when it is short and unbroken by another closing brace. */
const enclosingObject = (text: string, index: number): string | null => {
  const open = text.lastIndexOf("{", index);
  if (open === -1 || text.lastIndexOf("}", index) > open) return null;
  const close = text.indexOf("}", index);
  if (close === -1 || close - open > MAX_OBJECT_SPAN) return null;
  return text.slice(open, close + 1);
};

/** Quality and format from keys next to the URL, as in `{ file: "...", label: "720p", type: "hls" }`. */
const siblingHints = (objectText: string | null): Pick<StrategyHit, "qualityHint" | "formatHint"> => {
  const hints: Pick<StrategyHit, "qualityHint" | "formatHint"> = {};
  if (!objectText) return hints;

  for (const match of objectText.matchAll(SIBLING_HINT)) {
    const key = match[1].toLowerCase();
    const value = match[3] ?? match[4];
    if (key === "type" && !hints.formatHint) {
      const formatHint = mimeToFormat(value);
      if (formatHint) hints.formatHint = formatHint;
    } else if (QUALITY_KEYS.has(key) && !hints.qualityHint) {
      const qualityHint = parseQualityHint(value);
      if (qualityHint) hints.qualityHint = qualityHint;
    }
  }
  return hints;
};

/**
 * Scans JavaScript text for stream URLs: keyed player assignments first,
 * then any quoted URL-shaped string carrying a video extension. Keyed
 * values inside a small object literal pick up its label and type.
 */
export const scanScriptText = (text: string): StrategyHit[] => {
  const hits = new HitCollector();

  for (const match of text.matchAll(KEYED_ASSIGNMENT)) {
    const key = match[1].toLowerCase();
    const value = unescapeEmbeddedUrl(match[3] ?? "");
    if (!isUrlShaped(value)) continue;

    if (looksLikeStreamUrl(value) || (PLAYER_KEY_SET.has(key) && !hasNonVideoExtension(value))) {
      hits.add(value, siblingHints(enclosingObject(text, match.index ?? 0)));
    }
  }

  for (const match of text.matchAll(QUOTED_STRING)) {
    const value = unescapeEmbeddedUrl(match[2] ?? "");
    if (isUrlShaped(value) && looksLikeStreamUrl(value)) hits.add(value);
  }

  return hits.toArray();
};

const JSON_SCRIPT_TYPES = new Set(["application/json", "application/ld+json"]);

export const inlineScriptStrategy: ExtractionStrategy = {
  name: "inline-script",
  discoveryMethod: "script",
  extract(document: PageDocument): StrategyHit[] {
    const hits = new HitCollector();
    for (const block of inlineScripts(document)) {
      if (block.type && JSON_SCRIPT_TYPES.has(block.type)) continue;
      for (const hit of scanScriptText(block.body)) hits.add(hit.url, hit);
    }
    return hits.toArray();
  },
};
