import { FetchError } from "../runtime/errors";

export type RetryCategory =
  | "timeout"
  | "network"
  | "server"
  | "throttled"
  | "client"
  | "aborted"
  | "internal";

export interface AdaptiveRetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  throttledDelayMs: number;
  jitterMs: number;
}

export interface RetryDecision {
  retry: boolean;
  category: RetryCategory;
  delayMs: number;
}

const RETRYABLE_CATEGORIES: ReadonlySet<RetryCategory> = new Set([
  "timeout",
  "network",
  "server",
  "throttled",
]);

const NETWORK_MARKERS = [
  "network",
  "econnreset",
  "econnrefused",
  "enotfound",
  "eai_again",
  "socket hang up",
  "fetch failed",
];

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const classifyRetryCategory = (error: unknown): RetryCategory => {
  if (error instanceof FetchError) {
    if (error.kind === "timeout") return "timeout";
    if (error.kind === "connection_failed") return "network";
    if (error.status === 429) return "throttled";
    if (error.status !== null && error.status >= 500) return "server";
    return "client";
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") return "aborted";
    const message = error.message.toLowerCase();
    if (message.includes("timeout") || message.includes("timed out")) return "timeout";
    if (NETWORK_MARKERS.some((marker) => message.includes(marker))) return "network";
  }

  return "internal";
};

const computeDelay = (
  config: AdaptiveRetryConfig,
  category: RetryCategory,
  attempt: number,
  error: unknown,
  random: () => number,
): number => {
  if (category === "throttled") {
    const hinted = error instanceof FetchError ? error.retryAfterMs : null;
    return clamp(hinted ?? config.throttledDelayMs, 0, config.maxDelayMs);
  }

  const exp = Math.max(0, attempt - 1);
  const base = config.baseDelayMs * Math.pow(2, exp);
  const jitter = Math.floor(random() * config.jitterMs);
  return clamp(base + jitter, 0, config.maxDelayMs);
};

export const decideRetry = (
  config: AdaptiveRetryConfig,
  error: unknown,
  attempt: number,
  random: () => number = Math.random,
): RetryDecision => {
  const category = classifyRetryCategory(error);
  const maxAttempts = Math.max(1, config.maxAttempts);
  const canRetry = attempt < maxAttempts && RETRYABLE_CATEGORIES.has(category);

  return {
    retry: canRetry,
    category,
    delayMs: canRetry ? computeDelay(config, category, attempt, error, random) : 0,
  };
};

/** Resolves after `ms`, or rejects with an AbortError as soon as `signal` fires. */
export const abortableSleep = async (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    const abortError = (): Error => Object.assign(new Error("Wait aborted."), { name: "AbortError" });
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryAttemptContext {
  attempt: number;
  maxAttempts: number;
  category: RetryCategory;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  random?: () => number;
  onRetry?: (ctx: RetryAttemptContext) => Promise<void> | void;
}

export const executeWithAdaptiveRetry = async <T>(
  config: AdaptiveRetryConfig,
  run: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> => {
  let attempt = 1;
  const maxAttempts = Math.max(1, config.maxAttempts);
  while (attempt <= maxAttempts) {
    try {
      return await run(attempt);
    } catch (error) {
      const decision = decideRetry(config, error, attempt, options.random);
      const retry = decision.retry && !options.signal?.aborted;
      const ctx: RetryAttemptContext = {
        attempt,
        maxAttempts,
        category: decision.category,
        delayMs: decision.delayMs,
        error,
      };

      if (!retry) throw error;

      if (options.onRetry) {
        await options.onRetry(ctx);
      }
      if (decision.delayMs > 0) {
        try {
          await abortableSleep(decision.delayMs, options.signal);
        } catch {
          // The caller's budget ran out mid-backoff; surface the last real failure.
          throw error;
        }
      }
      attempt += 1;
    }
  }

  throw new Error("Retry loop exited unexpectedly.");
};
