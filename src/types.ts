export type LogLevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface ActorInput {
  host?: string;
  port?: number;
  logLevel?: LogLevelName;
  requiredEnvVars?: string[];
  apiKeyEnabled?: boolean;
  apiKey?: string;
  supportedDomains?: string[];
  minPathSegments?: number;
  rateLimitWindowMs?: number;
  rateLimitMax?: number;
  fetchTimeoutMs?: number;
  fetchMaxRedirects?: number;
  fetchMinHostIntervalMs?: number;
  retryMaxAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  retryJitterMs?: number;
  extractionTimeoutMs?: number;
  iframeMaxDepth?: number;
  iframeMaxConcurrency?: number;
  iframeMaxPerPage?: number;
  linkValidationEnabled?: boolean;
  linkValidationTimeoutMs?: number;
  maxLinks?: number;
  userAgents?: string[];
  requestQueueConcurrency?: number;
  requestQueueMaxSize?: number;
  requestBodyMaxBytes?: number;
  shutdownDrainTimeoutMs?: number;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevelName;
  apiKeyEnabled: boolean;
  apiKey: string | null;
  supportedDomains: string[];
  minPathSegments: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  fetchTimeoutMs: number;
  fetchMaxRedirects: number;
  /** Minimum spacing between requests to one host; 0 disables pacing. */
  fetchMinHostIntervalMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitterMs: number;
  extractionTimeoutMs: number;
  iframeMaxDepth: number;
  iframeMaxConcurrency: number;
  iframeMaxPerPage: number;
  linkValidationEnabled: boolean;
  linkValidationTimeoutMs: number;
  maxLinks: number;
  userAgents: string[];
  requestQueueConcurrency: number;
  requestQueueMaxSize: number;
  requestBodyMaxBytes: number;
  shutdownDrainTimeoutMs: number;
}
