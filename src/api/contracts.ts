export const API_VERSION = "0.1.0";

export interface ExtractTimeoutPolicy {
  minMs: number;
  maxMs: number;
  defaultMs: number;
}

export interface ExtractRequestPayload {
  url: string;
  requester_id?: string;
  validate_links?: boolean;
  timeout_ms?: number;
}

export const buildExtractRequestSchema = (
  timeoutPolicy: ExtractTimeoutPolicy,
): Record<string, unknown> => ({
  $id: "ExtractRequestV1",
  type: "object",
  additionalProperties: false,
  required: ["url"],
  properties: {
    url: {
      type: "string",
      minLength: 1,
      maxLength: 2000,
      pattern: "\\S",
      examples: ["https://phimmoi.net/phim/ten-phim/tap-1/"],
    },
    requester_id: {
      type: "string",
      minLength: 1,
      maxLength: 128,
      pattern: "\\S",
      description: "Rate-limit bucket. Defaults to the API key id or the client IP.",
    },
    validate_links: {
      type: "boolean",
      description: "Probe each link with HEAD before returning. Defaults to the server setting.",
    },
    timeout_ms: {
      type: "integer",
      minimum: timeoutPolicy.minMs,
      maximum: timeoutPolicy.maxMs,
      default: timeoutPolicy.defaultMs,
    },
  },
});

export const EXAMPLES = {
  extractRequest: {
    url: "https://phimmoi.net/phim/ten-phim/tap-1/",
    requester_id: "chat-12345",
    validate_links: true,
    timeout_ms: 30000,
  },
};
