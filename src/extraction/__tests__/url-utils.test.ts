import { describe, expect, it } from "@jest/globals";
import {
  hostOf,
  isIgnoredFrameUrl,
  looksLikeStreamUrl,
  normalizedUrlKey,
  resolveCandidateUrl,
  unescapeEmbeddedUrl,
} from "../url-utils";

describe("unescapeEmbeddedUrl", () => {
  it("undoes JSON, JS and HTML escaping", () => {
    expect(unescapeEmbeddedUrl(String.raw`https:\/\/cdn.example\/ep1\/video.mp4`)).toBe(
      "https://cdn.example/ep1/video.mp4",
    );
    expect(unescapeEmbeddedUrl(String.raw`https:\u002F\u002Fcdn.example\u002Fm.m3u8?a=1\u0026b=2`)).toBe(
      "https://cdn.example/m.m3u8?a=1&b=2",
    );
    expect(unescapeEmbeddedUrl("https://cdn.example/v.mp4?a=1&amp;b=2")).toBe("https://cdn.example/v.mp4?a=1&b=2");
    expect(unescapeEmbeddedUrl("https:&#x2F;&#x2F;cdn.example&#47;v.mp4")).toBe("https://cdn.example/v.mp4");
  });
});

describe("resolveCandidateUrl", () => {
  const page = "https://phimmoi.net/phim/ten-phim/tap-1";

  it("resolves relative and protocol-relative references without fragments", () => {
    expect(resolveCandidateUrl("//cdn.example/v.mp4#t=10", page)).toBe("https://cdn.example/v.mp4");
    expect(resolveCandidateUrl("../v.mp4", page)).toBe("https://phimmoi.net/phim/v.mp4");
    expect(resolveCandidateUrl("/media/a.m3u8", page)).toBe("https://phimmoi.net/media/a.m3u8");
  });

  it("drops references that cannot be fetched over http", () => {
    expect(resolveCandidateUrl("javascript:void(0)", page)).toBeNull();
    expect(resolveCandidateUrl("data:video/mp4;base64,AAAA", page)).toBeNull();
    expect(resolveCandidateUrl("mailto:admin@phimmoi.net", page)).toBeNull();
    expect(resolveCandidateUrl("  ", page)).toBeNull();
  });
});

describe("url helpers", () => {
  it("keys URLs without their fragment", () => {
    expect(normalizedUrlKey("https://CDN.Example/a.mp4#x")).toBe("https://cdn.example/a.mp4");
    expect(normalizedUrlKey(" not a url ")).toBe("not a url");
  });

  it("recognizes stream-looking URLs", () => {
    expect(looksLikeStreamUrl("https://cdn.example/v.mp4?token=1")).toBe(true);
    expect(looksLikeStreamUrl("https://cdn.example/master.m3u8")).toBe(true);
    expect(looksLikeStreamUrl("https://cdn.example/hls/index")).toBe(true);
    expect(looksLikeStreamUrl("https://cdn.example/ep1.WEBM")).toBe(true);
    expect(looksLikeStreamUrl("https://cdn.example/poster.jpg")).toBe(false);
    expect(looksLikeStreamUrl("https://cdn.example/mp4/player")).toBe(false);
  });

  it("ignores placeholder frame schemes", () => {
    expect(isIgnoredFrameUrl("about:blank")).toBe(true);
    expect(isIgnoredFrameUrl(" blob:https://x")).toBe(true);
    expect(isIgnoredFrameUrl("https://player.example/e/1")).toBe(false);
  });

  it("reads hosts", () => {
    expect(hostOf("https://Player.Example/e/1")).toBe("player.example");
    expect(hostOf("nope")).toBeNull();
  });
});
