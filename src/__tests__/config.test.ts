import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { buildRuntimeConfig, ConfigValidationError } from "../config";
import { DEFAULT_SUPPORTED_DOMAINS } from "../constants";
import type { ActorInput } from "../types";

const ENV_KEYS = [
  "HOST",
  "PORT",
  "LOG_LEVEL",
  "REQUIRED_ENV_VARS",
  "API_KEY_ENABLED",
  "API_KEY",
  "SUPPORTED_DOMAINS",
  "RATE_LIMIT_MAX",
  "FETCH_TIMEOUT_MS",
  "FETCH_MIN_HOST_INTERVAL_MS",
  "EXTRACTION_TIMEOUT_MS",
  "IFRAME_MAX_DEPTH",
  "LINK_VALIDATION_ENABLED",
  "LINK_VALIDATION_TIMEOUT_MS",
  "MAX_LINKS",
  "USER_AGENTS",
];

const issuesOf = (input: ActorInput): string[] => {
  try {
    buildRuntimeConfig(input);
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.issues;
    throw error;
  }
  return [];
};

describe("buildRuntimeConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("falls back to defaults", () => {
    const config = buildRuntimeConfig({});

    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe("INFO");
    expect(config.rateLimitWindowMs).toBe(60000);
    expect(config.rateLimitMax).toBe(5);
    expect(config.iframeMaxDepth).toBe(2);
    expect(config.linkValidationEnabled).toBe(true);
    expect(config.linkValidationTimeoutMs).toBe(5000);
    expect(config.maxLinks).toBe(20);
    expect(config.fetchMinHostIntervalMs).toBe(1000);
    expect(config.supportedDomains).toEqual([...DEFAULT_SUPPORTED_DOMAINS]);
    expect(config.userAgents).toHaveLength(4);
  });

  it("prefers actor input over environment variables", () => {
    process.env.RATE_LIMIT_MAX = "9";
    process.env.LINK_VALIDATION_ENABLED = "off";

    expect(buildRuntimeConfig({}).rateLimitMax).toBe(9);
    expect(buildRuntimeConfig({}).linkValidationEnabled).toBe(false);
    expect(buildRuntimeConfig({ rateLimitMax: 3 }).rateLimitMax).toBe(3);
  });

  it("reads per-host pacing and lets it be turned off", () => {
    process.env.FETCH_MIN_HOST_INTERVAL_MS = "250";

    expect(buildRuntimeConfig({}).fetchMinHostIntervalMs).toBe(250);
    expect(buildRuntimeConfig({ fetchMinHostIntervalMs: 0 }).fetchMinHostIntervalMs).toBe(0);
    expect(issuesOf({ fetchMinHostIntervalMs: -1 })).toEqual([
      "`fetchMinHostIntervalMs` must be within 0-60000. Received: -1.",
    ]);
  });

  it("normalizes the domain allow-list", () => {
    const config = buildRuntimeConfig({ supportedDomains: ["www.Example.com", "example.com", " kkphim.vip "] });
    expect(config.supportedDomains).toEqual(["example.com", "kkphim.vip"]);
  });

  it("splits user agents on a double pipe", () => {
    process.env.USER_AGENTS = "agent-a || agent-b";
    expect(buildRuntimeConfig({}).userAgents).toEqual(["agent-a", "agent-b"]);
  });

  it("reports every problem at once", () => {
    const issues = issuesOf({
      fetchTimeoutMs: 90000,
      extractionTimeoutMs: 60000,
      iframeMaxDepth: 6,
      linkValidationTimeoutMs: 6000,
    });

    expect(issues).toEqual([
      "`fetchTimeoutMs` must be less than or equal to `extractionTimeoutMs`.",
      "`iframeMaxDepth` must be within 0-5. Received: 6.",
      "`linkValidationTimeoutMs` must be within 100-5000. Received: 6000.",
    ]);
  });

  it("requires a key when API key auth is on", () => {
    expect(issuesOf({ apiKeyEnabled: true })).toEqual([
      "`apiKey` is required when `apiKeyEnabled=true` (input `apiKey` or env `API_KEY`).",
    ]);
    expect(buildRuntimeConfig({ apiKeyEnabled: true, apiKey: " test-secret " }).apiKey).toBe("test-secret");
  });

  it("rejects unparseable booleans and hostnames", () => {
    process.env.LINK_VALIDATION_ENABLED = "maybe";

    expect(issuesOf({ supportedDomains: ["not a host"] })).toEqual([
      "`supportedDomains` contains invalid hostnames: not a host.",
      '`linkValidationEnabled` must be a boolean (true/false, 1/0, yes/no). Received: "maybe".',
    ]);
  });
});
