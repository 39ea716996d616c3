import { config as loadDotEnv } from "dotenv";
import { DEFAULT_SUPPORTED_DOMAINS, DEFAULT_USER_AGENTS } from "./constants";
import type { ActorInput, LogLevelName, RuntimeConfig } from "./types";

loadDotEnv();

const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ["DEBUG", "INFO", "WARNING", "ERROR"];
const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);
const DOMAIN_PATTERN = /^(?=.{4,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(
      `Configuration validation failed:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

const isLogLevel = (value: string): value is LogLevelName =>
  ALLOWED_LOG_LEVELS.some((level) => level === value);

const parseStringList = (
  inputList: string[] | undefined,
  envList: string | undefined,
  separator = ",",
): string[] => {
  if (Array.isArray(inputList) && inputList.length > 0) {
    return [...new Set(inputList.map((entry) => entry.trim()).filter(Boolean))];
  }

  if (!envList) return [];
  return [...new Set(envList.split(separator).map((entry) => entry.trim()).filter(Boolean))];
};

const parseDomainList = (
  inputList: string[] | undefined,
  envList: string | undefined,
  issues: string[],
): string[] => {
  const parsed = parseStringList(inputList, envList).map((entry) =>
    entry.toLowerCase().replace(/^www\./, ""),
  );
  if (parsed.length === 0) return [...DEFAULT_SUPPORTED_DOMAINS];

  const invalid = parsed.filter((entry) => !DOMAIN_PATTERN.test(entry));
  if (invalid.length > 0) {
    issues.push(`\`supportedDomains\` contains invalid hostnames: ${invalid.join(", ")}.`);
  }
  return [...new Set(parsed)];
};

const parseBooleanWithValidation = (
  value: boolean | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: boolean,
): boolean => {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return fallback;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  issues.push(
    `\`${fieldName}\` must be a boolean (true/false, 1/0, yes/no). Received: ${JSON.stringify(value)}.`,
  );
  return fallback;
};

const parseIntegerWithRangeValidation = (
  value: number | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number,
  min: number,
  max: number,
): number => {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value)
        : fallback;

  if (!Number.isInteger(parsed)) {
    issues.push(`\`${fieldName}\` must be an integer. Received: ${JSON.stringify(value)}.`);
    return fallback;
  }
  if (parsed < min || parsed > max) {
    issues.push(`\`${fieldName}\` must be within ${min}-${max}. Received: ${parsed}.`);
    return fallback;
  }
  return parsed;
};

export const buildRuntimeConfig = (input: ActorInput): RuntimeConfig => {
  const issues: string[] = [];
  const env = process.env;

  const rawHost = input.host ?? env.HOST ?? "0.0.0.0";
  const host = typeof rawHost === "string" ? rawHost.trim() : "";
  if (!host) {
    issues.push("`host` must be a non-empty string (input `host` or env `HOST`).");
  }

  const port = parseIntegerWithRangeValidation(input.port ?? env.PORT, "port", issues, 3000, 0, 65535);

  const rawLogLevel = String(input.logLevel ?? env.LOG_LEVEL ?? "INFO").toUpperCase();
  let logLevel: LogLevelName = "INFO";
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    issues.push(
      `\`logLevel\` must be one of ${ALLOWED_LOG_LEVELS.join(", ")}. Received: ${JSON.stringify(rawLogLevel)} (input \`logLevel\` or env \`LOG_LEVEL\`).`,
    );
  }

  const requiredEnvVars = parseStringList(input.requiredEnvVars, env.REQUIRED_ENV_VARS);
  for (const envName of requiredEnvVars) {
    if (!env[envName]) {
      issues.push(
        `Required env var \`${envName}\` is missing. Set it before starting the actor.`,
      );
    }
  }

  const apiKeyEnabled = parseBooleanWithValidation(
    input.apiKeyEnabled ?? env.API_KEY_ENABLED,
    "apiKeyEnabled",
    issues,
    false,
  );

  const apiKeyRaw = input.apiKey ?? env.API_KEY;
  const apiKey = typeof apiKeyRaw === "string" && apiKeyRaw.trim().length > 0 ? apiKeyRaw.trim() : null;
  if (apiKeyEnabled && !apiKey) {
    issues.push(
      "`apiKey` is required when `apiKeyEnabled=true` (input `apiKey` or env `API_KEY`).",
    );
  }

  const supportedDomains = parseDomainList(input.supportedDomains, env.SUPPORTED_DOMAINS, issues);

  const minPathSegments = parseIntegerWithRangeValidation(
    input.minPathSegments ?? env.MIN_PATH_SEGMENTS,
    "minPathSegments",
    issues,
    1,
    0,
    10,
  );

  const rateLimitWindowMs = parseIntegerWithRangeValidation(
    input.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
    "rateLimitWindowMs",
    issues,
    60000,
    1000,
    3600000,
  );

  const rateLimitMax = parseIntegerWithRangeValidation(
    input.rateLimitMax ?? env.RATE_LIMIT_MAX,
    "rateLimitMax",
    issues,
    5,
    1,
    10000,
  );

  const fetchTimeoutMs = parseIntegerWithRangeValidation(
    input.fetchTimeoutMs ?? env.FETCH_TIMEOUT_MS,
    "fetchTimeoutMs",
    issues,
    30000,
    1000,
    300000,
  );

  const fetchMaxRedirects = parseIntegerWithRangeValidation(
    input.fetchMaxRedirects ?? env.FETCH_MAX_REDIRECTS,
    "fetchMaxRedirects",
    issues,
    5,
    0,
    20,
  );

  const fetchMinHostIntervalMs = parseIntegerWithRangeValidation(
    input.fetchMinHostIntervalMs ?? env.FETCH_MIN_HOST_INTERVAL_MS,
    "fetchMinHostIntervalMs",
    issues,
    1000,
    0,
    60000,
  );

  const retryMaxAttempts = parseIntegerWithRangeValidation(
    input.retryMaxAttempts ?? env.RETRY_MAX_ATTEMPTS,
    "retryMaxAttempts",
    issues,
    3,
    1,
    10,
  );

  const retryBaseDelayMs = parseIntegerWithRangeValidation(
    input.retryBaseDelayMs ?? env.RETRY_BASE_DELAY_MS,
    "retryBaseDelayMs",
    issues,
    1000,
    0,
    60000,
  );

  const retryMaxDelayMs = parseIntegerWithRangeValidation(
    input.retryMaxDelayMs ?? env.RETRY_MAX_DELAY_MS,
    "retryMaxDelayMs",
    issues,
    8000,
    0,
    120000,
  );

  const retryJitterMs = parseIntegerWithRangeValidation(
    input.retryJitterMs ?? env.RETRY_JITTER_MS,
    "retryJitterMs",
    issues,
    250,
    0,
    10000,
  );

  if (retryBaseDelayMs > retryMaxDelayMs) {
    issues.push("`retryBaseDelayMs` must be less than or equal to `retryMaxDelayMs`.");
  }

  const extractionTimeoutMs = parseIntegerWithRangeValidation(
    input.extractionTimeoutMs ?? env.EXTRACTION_TIMEOUT_MS,
    "extractionTimeoutMs",
    issues,
    60000,
    1000,
    600000,
  );

  if (fetchTimeoutMs > extractionTimeoutMs) {
    issues.push("`fetchTimeoutMs` must be less than or equal to `extractionTimeoutMs`.");
  }

  const iframeMaxDepth = parseIntegerWithRangeValidation(
    input.iframeMaxDepth ?? env.IFRAME_MAX_DEPTH,
    "iframeMaxDepth",
    issues,
    2,
    0,
    5,
  );

  const iframeMaxConcurrency = parseIntegerWithRangeValidation(
    input.iframeMaxConcurrency ?? env.IFRAME_MAX_CONCURRENCY,
    "iframeMaxConcurrency",
    issues,
    5,
    1,
    20,
  );

  const iframeMaxPerPage = parseIntegerWithRangeValidation(
    input.iframeMaxPerPage ?? env.IFRAME_MAX_PER_PAGE,
    "iframeMaxPerPage",
    issues,
    10,
    1,
    100,
  );

  const linkValidationEnabled = parseBooleanWithValidation(
    input.linkValidationEnabled ?? env.LINK_VALIDATION_ENABLED,
    "linkValidationEnabled",
    issues,
    true,
  );

  const linkValidationTimeoutMs = parseIntegerWithRangeValidation(
    input.linkValidationTimeoutMs ?? env.LINK_VALIDATION_TIMEOUT_MS,
    "linkValidationTimeoutMs",
    issues,
    5000,
    100,
    5000,
  );

  const maxLinks = parseIntegerWithRangeValidation(
    input.maxLinks ?? env.MAX_LINKS,
    "maxLinks",
    issues,
    20,
    1,
    500,
  );

  const customUserAgents = parseStringList(input.userAgents, env.USER_AGENTS, "||");
  const userAgents = customUserAgents.length > 0 ? customUserAgents : [...DEFAULT_USER_AGENTS];

  const requestQueueConcurrency = parseIntegerWithRangeValidation(
    input.requestQueueConcurrency ?? env.REQUEST_QUEUE_CONCURRENCY,
    "requestQueueConcurrency",
    issues,
    4,
    1,
    50,
  );

  const requestQueueMaxSize = parseIntegerWithRangeValidation(
    input.requestQueueMaxSize ?? env.REQUEST_QUEUE_MAX_SIZE,
    "requestQueueMaxSize",
    issues,
    100,
    1,
    10000,
  );

  const requestBodyMaxBytes = parseIntegerWithRangeValidation(
    input.requestBodyMaxBytes ?? env.REQUEST_BODY_MAX_BYTES,
    "requestBodyMaxBytes",
    issues,
    16_384,
    1_024,
    1_000_000,
  );

  const shutdownDrainTimeoutMs = parseIntegerWithRangeValidation(
    input.shutdownDrainTimeoutMs ?? env.SHUTDOWN_DRAIN_TIMEOUT_MS,
    "shutdownDrainTimeoutMs",
    issues,
    20000,
    1000,
    600000,
  );

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    host,
    port,
    logLevel,
    apiKeyEnabled,
    apiKey,
    supportedDomains,
    minPathSegments,
    rateLimitWindowMs,
    rateLimitMax,
    fetchTimeoutMs,
    fetchMaxRedirects,
    fetchMinHostIntervalMs,
    retryMaxAttempts,
    retryBaseDelayMs,
    retryMaxDelayMs,
    retryJitterMs,
    extractionTimeoutMs,
    iframeMaxDepth,
    iframeMaxConcurrency,
    iframeMaxPerPage,
    linkValidationEnabled,
    linkValidationTimeoutMs,
    maxLinks,
    userAgents,
    requestQueueConcurrency,
    requestQueueMaxSize,
    requestBodyMaxBytes,
    shutdownDrainTimeoutMs,
  };
};
