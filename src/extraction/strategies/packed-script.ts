import type { ExtractionStrategy, PageDocument, StrategyHit } from "../types";
import { scanScriptText } from "./inline-script";
import { HitCollector, inlineScripts } from "./shared";

const PACKED_CALL =
  /}\s*\(\s*(['"])((?:\\.|(?!\1)[^\\])*)\1\s*,\s*(\d+)\s*,\s*(\d+)\s*,\s*(['"])((?:\\.|(?!\5)[^\\])*)\5\.split\(\s*['"]\|['"]\s*\)/g;
const BASE62_DIGITS = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

export interface PackedPayload {
  payload: string;
  radix: number;
  count: number;
  keywords: string[];
}

const unescapeLiteral = (value: string): string => value.replace(/\\(['"\\])/g, "$1");

const decodeToken = (token: string, radix: number): number | null => {
  let value = 0;
  for (const char of token) {
    const digit = BASE62_DIGITS.indexOf(char);
    if (digit < 0 || digit >= radix) return null;
    value = value * radix + digit;
  }
  return value;
};

/** Finds every `eval(function(p,a,c,k,e,d){...}(...))` argument list in `text`. */
export const findPackedPayloads = (text: string): PackedPayload[] => {
  const payloads: PackedPayload[] = [];
  for (const match of text.matchAll(PACKED_CALL)) {
    const radix = Number(match[3]);
    const count = Number(match[4]);
    if (!Number.isInteger(radix) || radix < 2 || radix > 62) continue;

    payloads.push({
      payload: unescapeLiteral(match[2] ?? ""),
      radix,
      count,
      keywords: unescapeLiteral(match[6] ?? "").split("|"),
    });
  }
  return payloads;
};

/** Substitutes every base-`radix` word token with its keyword, leaving tokens without one as they are. */
export const unpack = ({ payload, radix, count, keywords }: PackedPayload): string =>
  payload.replace(/\b\w+\b/g, (token) => {
    const index = decodeToken(token, radix);
    if (index === null || index >= count) return token;
    return keywords[index] || token;
  });

export const packedScriptStrategy: ExtractionStrategy = {
  name: "packed-script",
  discoveryMethod: "script",
  extract(document: PageDocument): StrategyHit[] {
    const hits = new HitCollector();
    for (const block of inlineScripts(document)) {
      if (!block.body.includes("eval(function(p,a,c,k,e,")) continue;
      for (const packed of findPackedPayloads(block.body)) {
        for (const hit of scanScriptText(unpack(packed))) hits.add(hit.url, hit);
      }
    }
    return hits.toArray();
  },
};
