import { parseQualityHint } from "../quality-classifier";
import type { ExtractionStrategy, PageDocument, Quality, StrategyHit } from "../types";
import { looksLikeStreamUrl } from "../url-utils";
import { HitCollector, hasNonVideoExtension, inlineScripts, isUrlShaped, mimeToFormat } from "./shared";

const JSON_SCRIPT_TYPES = new Set(["application/json", "application/ld+json"]);
const LITERAL_START = /[=:(,]\s*([[{])/g;
const MAX_LITERAL_CHARS = 200_000;
const MAX_LITERALS_PER_SCRIPT = 50;
const MAX_WALK_DEPTH = 24;

const STREAM_KEYS = new Set(["file", "contenturl", "videourl", "streamurl", "hls", "playlist"]);
const GENERIC_KEYS = new Set(["src", "url"]);
const FRAME_KEYS = new Set(["embedurl"]);
const QUALITY_KEYS = ["label", "quality", "res", "resolution", "height"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Returns the balanced `{...}` or `[...]` literal starting at `start`,
 * skipping over string contents, or null when it never closes.
 */
export const sliceBalancedLiteral = (text: string, start: number): string | null => {
  const open = text[start];
  if (open !== "{" && open !== "[") return null;

  const stack: string[] = [];
  let quote: string | null = null;
  const limit = Math.min(text.length, start + MAX_LITERAL_CHARS);

  for (let index = start; index < limit; index += 1) {
    const char = text[index];
    if (quote) {
      if (char === "\\") index += 1;
      else if (char === quote) quote = null;
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "{" || char === "[") {
      stack.push(char === "{" ? "}" : "]");
    } else if (char === "}" || char === "]") {
      if (stack.pop() !== char) return null;
      if (stack.length === 0) return text.slice(start, index + 1);
    }
  }
  return null;
};

const siblingQuality = (record: Record<string, unknown>): Quality | undefined => {
  for (const key of QUALITY_KEYS) {
    const hint = parseQualityHint(record[key]);
    if (hint) return hint;
  }
  return undefined;
};

const walk = (value: unknown, hits: HitCollector, depth: number): void => {
  if (depth > MAX_WALK_DEPTH) return;

  if (Array.isArray(value)) {
    for (const entry of value) walk(entry, hits, depth + 1);
    return;
  }
  if (!isRecord(value)) return;

  const qualityHint = siblingQuality(value);
  const formatHint = mimeToFormat(typeof value.type === "string" ? value.type : undefined);

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      const candidate = entry.trim();
      if (!isUrlShaped(candidate)) continue;

      const normalizedKey = key.toLowerCase();
      if (FRAME_KEYS.has(normalizedKey)) {
        hits.add(candidate, { kind: "frame" });
      } else if (looksLikeStreamUrl(candidate)) {
        hits.add(candidate, { qualityHint, formatHint });
      } else if (STREAM_KEYS.has(normalizedKey) && !hasNonVideoExtension(candidate)) {
        hits.add(candidate, { qualityHint, formatHint });
      } else if (GENERIC_KEYS.has(normalizedKey) && formatHint) {
        // a bare `src`/`url` counts only when a sibling `type` names a stream format
        hits.add(candidate, { qualityHint, formatHint });
      }
    } else {
      walk(entry, hits, depth + 1);
    }
  }
};

const literalsIn = (body: string): unknown[] => {
  const parsed: unknown[] = [];
  let consumedUntil = 0;

  for (const match of body.matchAll(LITERAL_START)) {
    if (parsed.length >= MAX_LITERALS_PER_SCRIPT) break;
    const start = (match.index ?? 0) + match[0].length - 1;
    if (start < consumedUntil) continue;

    const literal = sliceBalancedLiteral(body, start);
    if (!literal) continue;
    const value = tryParseJson(literal);
    if (value === undefined) continue;

    parsed.push(value);
    consumedUntil = start + literal.length;
  }
  return parsed;
};

export const embeddedJsonStrategy: ExtractionStrategy = {
  name: "embedded-json",
  discoveryMethod: "script",
  extract(document: PageDocument): StrategyHit[] {
    const hits = new HitCollector();

    for (const block of inlineScripts(document)) {
      if (block.type && JSON_SCRIPT_TYPES.has(block.type)) {
        const value = tryParseJson(block.body.trim());
        if (value !== undefined) walk(value, hits, 0);
        continue;
      }
      for (const value of literalsIn(block.body)) walk(value, hits, 0);
    }

    return hits.toArray();
  },
};
