import log from "@apify/log";
import { type CheerioAPI, load } from "cheerio";
import { createDefaultStrategies } from "./strategies";
import type { Candidate, ExtractionStrategy, PageDocument, StrategyHit } from "./types";
import { resolveCandidateUrl } from "./url-utils";

const parseDocument = (html: string, pageUrl: string): CheerioAPI | null => {
  try {
    return load(html);
  } catch (error) {
    log.warning("HTML parsing failed; falling back to pattern scanning.", {
      pageUrl,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
};

/**
 * Runs every strategy over a page, in order, and unions their findings.
 * Frame references are emitted one level deeper than the page they sit on.
 */
export class PatternExtractor {
  private readonly strategies: readonly ExtractionStrategy[];

  public constructor(strategies: readonly ExtractionStrategy[] = createDefaultStrategies()) {
    this.strategies = strategies;
  }

  public strategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  public extract(html: string, pageUrl: string, depth: number): Candidate[] {
    const document: PageDocument = { html, pageUrl, depth, $: parseDocument(html, pageUrl) };
    const candidates: Candidate[] = [];

    for (const strategy of this.strategies) {
      let hits: StrategyHit[];
      try {
        hits = strategy.extract(document);
      } catch (error) {
        log.warning("Extraction strategy failed; skipping it for this page.", {
          strategy: strategy.name,
          pageUrl,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      for (const hit of hits) {
        const rawUrl = resolveCandidateUrl(hit.url, pageUrl);
        if (!rawUrl) continue;

        const kind = hit.kind ?? (strategy.discoveryMethod === "iframe" ? "frame" : "stream");
        const candidate: Candidate = {
          rawUrl,
          sourcePageUrl: pageUrl,
          discoveryMethod: strategy.discoveryMethod,
          depth: kind === "frame" ? depth + 1 : depth,
          kind,
          strategy: strategy.name,
        };
        if (hit.qualityHint) candidate.qualityHint = hit.qualityHint;
        if (hit.formatHint) candidate.formatHint = hit.formatHint;
        candidates.push(candidate);
      }
    }

    log.debug("Page patterns scanned.", {
      pageUrl,
      depth,
      streams: candidates.filter((candidate) => candidate.kind === "stream").length,
      frames: candidates.filter((candidate) => candidate.kind === "frame").length,
    });
    return candidates;
  }
}
