import { describe, expect, it } from "@jest/globals";
import { FakeWeb, NO_DELAY_RETRY } from "../../__tests__/helpers/fake-web";
import { FetchError } from "../errors";
import { PageFetcher, type PageFetcherConfig, parseRetryAfter } from "../page-fetcher";

const EPISODE = "https://phimmoi.net/phim/ten-phim/tap-1/";
const MiB = 1024 * 1024;

const createFetcher = (web: FakeWeb, overrides: Partial<PageFetcherConfig> = {}): PageFetcher =>
  new PageFetcher({
    timeoutMs: 1000,
    maxRedirects: 3,
    retry: NO_DELAY_RETRY,
    fetchImpl: web.fetch,
    ...overrides,
  });

const failureOf = async (promise: Promise<unknown>): Promise<FetchError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error("Expected the fetch to fail.");
};

describe("parseRetryAfter", () => {
  it("reads delta seconds and HTTP dates", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter("Thu, 01 Jan 1970 00:00:10 GMT", 4000)).toBe(6000);
    expect(parseRetryAfter("soon")).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });
});

describe("PageFetcher", () => {
  it("follows relative redirects and reports the final URL", async () => {
    const web = new FakeWeb()
      .redirect(EPISODE, "/xem/tap-1")
      .page("https://phimmoi.net/xem/tap-1", "<html>ok</html>");

    const result = await createFetcher(web).fetch(EPISODE);

    expect(result).toMatchObject({
      url: EPISODE,
      finalUrl: "https://phimmoi.net/xem/tap-1",
      httpStatus: 200,
      body: "<html>ok</html>",
      contentType: "text/html; charset=utf-8",
      attempts: 1,
      redirects: 1,
    });
    expect(web.requests.map((request) => request.url)).toEqual([EPISODE, "https://phimmoi.net/xem/tap-1"]);
  });

  it("gives up after the redirect limit", async () => {
    const web = new FakeWeb()
      .redirect("https://phimmoi.net/a", "https://phimmoi.net/b")
      .redirect("https://phimmoi.net/b", "https://phimmoi.net/c");

    const error = await failureOf(createFetcher(web, { maxRedirects: 1 }).fetch("https://phimmoi.net/a"));

    expect(error.kind).toBe("http_error");
    expect(error.status).toBe(302);
    expect(error.message).toBe("Too many redirects (max 1).");
    expect(web.requests).toHaveLength(2);
  });

  it("refuses to follow a redirect into a private address", async () => {
    const web = new FakeWeb().redirect(EPISODE, "http://127.0.0.1/admin");

    const error = await failureOf(createFetcher(web).fetch(EPISODE));

    expect(error.kind).toBe("http_error");
    expect(error.details).toMatchObject({ reason: "blocked_address", url: "http://127.0.0.1/admin" });
    expect(web.callsTo("http://127.0.0.1/admin")).toBe(0);
  });

  it("retries a server error and succeeds", async () => {
    let calls = 0;
    const web = new FakeWeb().on(EPISODE, () => {
      calls += 1;
      return calls === 1 ? { status: 503 } : { body: "<html>second</html>" };
    });

    const result = await createFetcher(web).fetch(EPISODE);

    expect(result.body).toBe("<html>second</html>");
    expect(result.attempts).toBe(2);
  });

  it("does not retry a 404", async () => {
    const web = new FakeWeb();

    const error = await failureOf(createFetcher(web).fetch(EPISODE));

    expect(error.kind).toBe("http_error");
    expect(error.status).toBe(404);
    expect(web.requests).toHaveLength(1);
  });

  it("times out every attempt when the page never answers", async () => {
    const web = new FakeWeb().on(EPISODE, { hang: true });

    const error = await failureOf(createFetcher(web, { timeoutMs: 20 }).fetch(EPISODE));

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Target page fetch timed out after 20ms.");
    expect(web.requests).toHaveLength(3);
  });

  it("maps network failures to connection_failed", async () => {
    const web = new FakeWeb().on(EPISODE, { fail: "getaddrinfo ENOTFOUND phimmoi.net" });

    const error = await failureOf(createFetcher(web).fetch(EPISODE));

    expect(error.kind).toBe("connection_failed");
    expect(error.message).toBe("Connection to target failed: getaddrinfo ENOTFOUND phimmoi.net");
    expect(web.requests).toHaveLength(3);
  });

  it("stops when the caller's deadline has already fired", async () => {
    const web = new FakeWeb().on(EPISODE, { hang: true });
    const deadline = new AbortController();
    deadline.abort();

    const error = await failureOf(createFetcher(web).fetch(EPISODE, { signal: deadline.signal }));

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Target page fetch was cancelled by the extraction deadline.");
    expect(web.requests).toHaveLength(1);
  });

  it("sends a rotated user agent and the referer, and caps the body in bytes", async () => {
    const web = new FakeWeb().page(EPISODE, "abcdefghij");
    const fetcher = createFetcher(web, {
      userAgents: ["agent-a", "agent-b"],
      random: () => 0.99,
      maxBodyBytes: 5,
    });

    const result = await fetcher.fetch(EPISODE, { referer: "https://phimmoi.net/" });

    expect(result.body).toBe("abcde");
    expect(web.requests[0].headers["user-agent"]).toBe("agent-b");
    expect(web.requests[0].headers.referer).toBe("https://phimmoi.net/");
    expect(web.requests[0].headers["accept-language"]).toBe("vi-VN,vi;q=0.9,en;q=0.8");
  });

  it("refuses media responses without reading their body", async () => {
    const web = new FakeWeb().on("https://cdn.example/movie.mp4", {
      headers: { "content-type": "video/mp4" },
      stream: { chunks: 50, chunkBytes: MiB },
    });

    const error = await failureOf(createFetcher(web).fetch("https://cdn.example/movie.mp4"));

    expect(error.kind).toBe("http_error");
    expect(error.retryable).toBe(false);
    expect(error.message).toBe("Target answered with non-text content (video/mp4).");
    expect(error.details).toMatchObject({ reason: "non_text_content", content_type: "video/mp4", status: 200 });
    expect(web.requests).toHaveLength(1);
    expect(web.bytesPulled).toBeLessThanOrEqual(2 * MiB);
  });

  it("stops reading a text body at the byte cap", async () => {
    const web = new FakeWeb().on(EPISODE, {
      headers: { "content-type": "text/html" },
      stream: { chunks: 50, chunkBytes: 1024 },
    });

    const result = await createFetcher(web, { maxBodyBytes: 2048 }).fetch(EPISODE);

    expect(result.body).toBe("a".repeat(2048));
    expect(web.bytesPulled).toBeLessThan(10 * 1024);
  });

  it("keeps the start of an error page for later inspection", async () => {
    const web = new FakeWeb().on(EPISODE, {
      status: 403,
      body: "<h1>Access denied</h1>",
      headers: { "content-type": "text/html" },
    });

    const error = await failureOf(createFetcher(web).fetch(EPISODE));

    expect(error.status).toBe(403);
    expect(error.url).toBe(EPISODE);
    expect(error.bodySnippet).toBe("<h1>Access denied</h1>");
    expect(error.details).not.toHaveProperty("bodySnippet");
  });

  it("caps a long retry-after hint at the policy's maximum delay", async () => {
    let calls = 0;
    const web = new FakeWeb().on(EPISODE, () => {
      calls += 1;
      return calls === 1 ? { status: 429, headers: { "retry-after": "1" } } : { body: "<html>after throttle</html>" };
    });
    const fetcher = createFetcher(web, {
      retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 50, throttledDelayMs: 0, jitterMs: 0 },
    });

    const started = Date.now();
    const result = await fetcher.fetch(EPISODE);

    expect(result.body).toBe("<html>after throttle</html>");
    expect(result.attempts).toBe(2);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(web.requests[1].at - web.requests[0].at).toBeGreaterThanOrEqual(45);
  });

  it("spaces requests to the same host", async () => {
    const web = new FakeWeb()
      .page("https://phimmoi.net/a", "a")
      .page("https://phimmoi.net/b", "b")
      .page("https://player.example/c", "c");
    const fetcher = createFetcher(web, { minHostIntervalMs: 200 });

    await Promise.all([
      fetcher.fetch("https://phimmoi.net/a"),
      fetcher.fetch("https://phimmoi.net/b"),
      fetcher.fetch("https://player.example/c"),
    ]);

    const at = (url: string): number => {
      const request = web.requests.find((recorded) => recorded.url === url);
      if (!request) throw new Error(`No request to ${url}`);
      return request.at;
    };
    expect(at("https://phimmoi.net/b") - at("https://phimmoi.net/a")).toBeGreaterThanOrEqual(190);
    expect(at("https://player.example/c") - at("https://phimmoi.net/a")).toBeLessThan(100);
  });
});
