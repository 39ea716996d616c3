import type { ExtractionStrategy, PageDocument, StrategyHit } from "../types";
import { isIgnoredFrameUrl } from "../url-utils";
import { HitCollector } from "./shared";

const FRAME_TAG_PATTERN = /<i?frame\b[^>]*>/gi;
const FRAME_ATTR_PATTERN = /\s(src|data-src|data-lazy-src)\s*=\s*["']([^"']*)["']/gi;

const pickFrameSource = (sources: Array<string | undefined>): string | undefined =>
  sources
    .map((value) => value?.trim())
    .find((value): value is string => Boolean(value) && !isIgnoredFrameUrl(value ?? ""));

export const iframeSourceStrategy: ExtractionStrategy = {
  name: "iframe-source",
  discoveryMethod: "iframe",
  extract(document: PageDocument): StrategyHit[] {
    const hits = new HitCollector();
    const { $ } = document;

    if ($) {
      $("iframe, frame").each((_, element) => {
        const frame = $(element);
        const src = pickFrameSource([frame.attr("src"), frame.attr("data-src"), frame.attr("data-lazy-src")]);
        hits.add(src, { kind: "frame" });
      });
      return hits.toArray();
    }

    for (const tag of document.html.matchAll(FRAME_TAG_PATTERN)) {
      const attrs = new Map<string, string>();
      for (const attr of tag[0].matchAll(FRAME_ATTR_PATTERN)) {
        attrs.set(attr[1].toLowerCase(), attr[2]);
      }
      const src = pickFrameSource([attrs.get("src"), attrs.get("data-src"), attrs.get("data-lazy-src")]);
      hits.add(src, { kind: "frame" });
    }
    return hits.toArray();
  },
};
