import { describe, expect, it } from "@jest/globals";
import { FetchError } from "../../runtime/errors";
import {
  type AdaptiveRetryConfig,
  classifyRetryCategory,
  decideRetry,
  executeWithAdaptiveRetry,
} from "../retry-policy";

const config: AdaptiveRetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  throttledDelayMs: 300,
  jitterMs: 0,
};

const httpError = (status: number, retryAfterMs: number | null = null): FetchError =>
  new FetchError({ kind: "http_error", url: "https://phimmoi.net/phim/x", status, retryAfterMs, message: "HTTP" });

const networkError = (): FetchError =>
  new FetchError({ kind: "connection_failed", url: "https://phimmoi.net/phim/x", message: "ECONNRESET" });

describe("classifyRetryCategory", () => {
  it("maps fetch failures by kind and status", () => {
    expect(classifyRetryCategory(new FetchError({ kind: "timeout", url: "u", message: "slow" }))).toBe("timeout");
    expect(classifyRetryCategory(networkError())).toBe("network");
    expect(classifyRetryCategory(httpError(429))).toBe("throttled");
    expect(classifyRetryCategory(httpError(503))).toBe("server");
    expect(classifyRetryCategory(httpError(404))).toBe("client");
  });

  it("falls back to error names and messages", () => {
    expect(classifyRetryCategory(Object.assign(new Error("stop"), { name: "AbortError" }))).toBe("aborted");
    expect(classifyRetryCategory(new Error("socket hang up"))).toBe("network");
    expect(classifyRetryCategory(new Error("request timed out"))).toBe("timeout");
    expect(classifyRetryCategory("boom")).toBe("internal");
  });
});

describe("decideRetry", () => {
  it("backs off exponentially until attempts run out", () => {
    expect(decideRetry(config, networkError(), 1)).toEqual({ retry: true, category: "network", delayMs: 100 });
    expect(decideRetry(config, networkError(), 2)).toEqual({ retry: true, category: "network", delayMs: 200 });
    expect(decideRetry(config, networkError(), 3)).toEqual({ retry: false, category: "network", delayMs: 0 });
  });

  it("adds jitter from the injected random source", () => {
    const decision = decideRetry({ ...config, jitterMs: 100 }, networkError(), 1, () => 0.5);
    expect(decision.delayMs).toBe(150);
  });

  it("honours Retry-After within the delay ceiling", () => {
    expect(decideRetry(config, httpError(429, 5000), 1).delayMs).toBe(1000);
    expect(decideRetry(config, httpError(429, 50), 1).delayMs).toBe(50);
    expect(decideRetry(config, httpError(429), 1).delayMs).toBe(300);
  });

  it("never retries client errors", () => {
    expect(decideRetry(config, httpError(404), 1)).toEqual({ retry: false, category: "client", delayMs: 0 });
  });
});

describe("executeWithAdaptiveRetry", () => {
  const immediate: AdaptiveRetryConfig = { ...config, baseDelayMs: 0, maxDelayMs: 0, throttledDelayMs: 0 };

  it("retries transient failures and returns the first success", async () => {
    const attempts: number[] = [];
    const retried: number[] = [];

    const result = await executeWithAdaptiveRetry(
      immediate,
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw networkError();
        return "page";
      },
      { onRetry: (ctx) => void retried.push(ctx.attempt) },
    );

    expect(result).toBe("page");
    expect(attempts).toEqual([1, 2, 3]);
    expect(retried).toEqual([1, 2]);
  });

  it("rethrows a non-retryable failure straight away", async () => {
    let calls = 0;
    const failure = httpError(404);

    await expect(
      executeWithAdaptiveRetry(immediate, async () => {
        calls += 1;
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(calls).toBe(1);
  });

  it("stops retrying once the caller's signal has fired", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      executeWithAdaptiveRetry(
        immediate,
        async () => {
          calls += 1;
          throw networkError();
        },
        { signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(FetchError);
    expect(calls).toBe(1);
  });
});
