import { parseQualityHint } from "../quality-classifier";
import type { ExtractionStrategy, PageDocument, StrategyHit } from "../types";
import { looksLikeStreamUrl, unescapeEmbeddedUrl } from "../url-utils";
import { HitCollector, hasNonVideoExtension, isUrlShaped, mimeToFormat } from "./shared";

const TAG_PATTERN = /<[a-z][\w:-]*\s[^>]*>/gi;
const ATTRIBUTE_VALUE_PATTERN = /\s[\w:.-]+\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const PLAIN_VALUE = /^[^\s{}<>"']+$/;

// Social and microdata tags naming the video file itself.
const STREAM_META_SELECTORS = [
  'meta[property="og:video"]',
  'meta[property="og:video:url"]',
  'meta[property="og:video:secure_url"]',
  'meta[name="twitter:player:stream"]',
  'meta[property="twitter:player:stream"]',
  'meta[itemprop="contentUrl"]',
  'link[itemprop="contentUrl"]',
].join(", ");

// Tags naming a player page to follow like a frame.
const PLAYER_META_SELECTORS = [
  'meta[name="twitter:player"]',
  'meta[property="twitter:player"]',
  'meta[itemprop="embedUrl"]',
  'link[itemprop="embedUrl"]',
  'link[rel="video_src"]',
].join(", ");

const readVideoElements = (document: PageDocument, hits: HitCollector): void => {
  const { $ } = document;
  if (!$) return;

  $("video").each((_, element) => {
    const video = $(element);
    const src = video.attr("src") ?? video.attr("data-src");
    hits.add(src, { formatHint: mimeToFormat(video.attr("type")) });

    video.find("source").each((__, sourceElement) => {
      const source = $(sourceElement);
      hits.add(source.attr("src") ?? source.attr("data-src"), {
        formatHint: mimeToFormat(source.attr("type")),
        qualityHint: parseQualityHint(
          source.attr("label") ?? source.attr("res") ?? source.attr("size") ?? source.attr("data-quality"),
        ),
      });
    });
  });

  // <source> outside <video> (audio-less players, malformed nesting)
  $("source").each((_, element) => {
    const source = $(element);
    const src = source.attr("src") ?? source.attr("data-src");
    const formatHint = mimeToFormat(source.attr("type"));
    if (!src || (!formatHint && !looksLikeStreamUrl(unescapeEmbeddedUrl(src)))) return;
    hits.add(src, {
      formatHint,
      qualityHint: parseQualityHint(source.attr("label") ?? source.attr("res") ?? source.attr("size")),
    });
  });
};

/**
 * `og:video`, `twitter:player:stream` and friends. A value that is not a
 * file URL but still looks like a page becomes a frame, as do player tags.
 */
const readMetaTags = (document: PageDocument, hits: HitCollector): void => {
  const { $ } = document;
  if (!$) return;

  const ogType = mimeToFormat($('meta[property="og:video:type"]').attr("content"));
  const ogHeight = parseQualityHint($('meta[property="og:video:height"]').attr("content"));

  $(STREAM_META_SELECTORS).each((_, element) => {
    const tag = $(element);
    const value = (tag.attr("content") ?? tag.attr("href"))?.trim();
    if (!value || !isUrlShaped(value) || hasNonVideoExtension(value)) return;

    if (looksLikeStreamUrl(unescapeEmbeddedUrl(value)) || ogType) {
      hits.add(value, { formatHint: ogType, qualityHint: ogHeight });
    } else {
      hits.add(value, { kind: "frame" });
    }
  });

  $(PLAYER_META_SELECTORS).each((_, element) => {
    const tag = $(element);
    const value = (tag.attr("content") ?? tag.attr("href"))?.trim();
    if (!value || !isUrlShaped(value)) return;
    hits.add(value, looksLikeStreamUrl(unescapeEmbeddedUrl(value)) ? {} : { kind: "frame" });
  });

  $("link[type][href]").each((_, element) => {
    const link = $(element);
    const type = link.attr("type") ?? "";
    const formatHint = mimeToFormat(type);
    if (formatHint || type.toLowerCase().startsWith("video/")) hits.add(link.attr("href"), { formatHint });
  });
};

/** Any attribute of any tag whose value is a stream URL, e.g. `data-file`, `value` on `<param>`. */
const scanTagAttributes = (html: string, hits: HitCollector): void => {
  for (const tag of html.matchAll(TAG_PATTERN)) {
    for (const attribute of tag[0].matchAll(ATTRIBUTE_VALUE_PATTERN)) {
      const value = (attribute[1] ?? attribute[2] ?? "").trim();
      if (!value || !PLAIN_VALUE.test(value)) continue;
      if (looksLikeStreamUrl(unescapeEmbeddedUrl(value))) hits.add(value);
    }
  }
};

export const directMarkupStrategy: ExtractionStrategy = {
  name: "direct-markup",
  discoveryMethod: "direct",
  extract(document: PageDocument): StrategyHit[] {
    const hits = new HitCollector();
    readVideoElements(document, hits);
    readMetaTags(document, hits);
    scanTagAttributes(document.html, hits);
    return hits.toArray();
  },
};
