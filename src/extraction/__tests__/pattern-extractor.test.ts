import { describe, expect, it } from "@jest/globals";
import { PatternExtractor } from "../pattern-extractor";
import { directMarkupStrategy } from "../strategies";
import type { ExtractionStrategy } from "../types";

const PAGE = "https://phimmoi.net/phim/ten-phim/tap-1/";

describe("PatternExtractor", () => {
  it("runs the default strategies in order", () => {
    expect(new PatternExtractor().strategyNames()).toEqual([
      "direct-markup",
      "inline-script",
      "embedded-json",
      "packed-script",
      "iframe-source",
    ]);
  });

  it("resolves hits against the page and places frames one level deeper", () => {
    const candidates = new PatternExtractor().extract(
      `<video src="/media/ep1.mp4"></video><iframe src="https://player.example/e/1#autoplay"></iframe>`,
      PAGE,
      0,
    );

    expect(candidates).toEqual([
      {
        rawUrl: "https://phimmoi.net/media/ep1.mp4",
        sourcePageUrl: PAGE,
        discoveryMethod: "direct",
        depth: 0,
        kind: "stream",
        strategy: "direct-markup",
      },
      {
        rawUrl: "https://player.example/e/1",
        sourcePageUrl: PAGE,
        discoveryMethod: "iframe",
        depth: 1,
        kind: "frame",
        strategy: "iframe-source",
      },
    ]);
  });

  it("keeps the same URL once per strategy that found it", () => {
    const candidates = new PatternExtractor().extract(
      `<video src="https://cdn.example/a.mp4"></video><script>var u = "https://cdn.example/a.mp4";</script>`,
      PAGE,
      0,
    );

    expect(candidates.map((candidate) => candidate.strategy)).toEqual(["direct-markup", "inline-script"]);
  });

  it("skips a failing strategy and drops unfetchable hits", () => {
    const broken: ExtractionStrategy = {
      name: "broken",
      discoveryMethod: "script",
      extract: () => {
        throw new Error("unexpected markup");
      },
    };
    const noisy: ExtractionStrategy = {
      name: "noisy",
      discoveryMethod: "script",
      extract: () => [{ url: "javascript:alert(1)" }, { url: "mailto:a@phimmoi.net" }, { url: "/ok.mp4", qualityHint: "360p" }],
    };

    const candidates = new PatternExtractor([broken, noisy, directMarkupStrategy]).extract("<p>empty</p>", PAGE, 2);

    expect(candidates).toEqual([
      {
        rawUrl: "https://phimmoi.net/ok.mp4",
        sourcePageUrl: PAGE,
        discoveryMethod: "script",
        depth: 2,
        kind: "stream",
        strategy: "noisy",
        qualityHint: "360p",
      },
    ]);
  });
});
