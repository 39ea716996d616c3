import { isIP } from "node:net";
import { InvalidUrlError } from "../runtime/errors";

export interface DomainValidatorConfig {
  supportedDomains: readonly string[];
  minPathSegments?: number;
  minUrlLength?: number;
  maxUrlLength?: number;
}

export interface NormalizedTarget {
  url: string;
  host: string;
  domain: string;
  pathSegments: string[];
}

const ALLOWED_SCHEMES = new Set(["http:", "https:"]);

const PRIVATE_IPV4_PATTERNS = [
  /^0\./,
  /^10\./,
  /^127\./,
  /^169\.254\./,
  /^172\.(1[6-9]|2\d|3[01])\./,
  /^192\.168\./,
];

const PRIVATE_IPV6_PATTERNS = [/^::1?$/, /^f[cd][0-9a-f]{2}:/, /^fe80:/, /^::ffff:/];

export const stripWww = (host: string): string => host.toLowerCase().replace(/^www\./, "");

const stripBrackets = (host: string): string => host.replace(/^\[/, "").replace(/\]$/, "");

/**
 * Loopback, private, link-local and `localhost` hosts are never fetched,
 * whether they come from user input, a redirect or an iframe.
 */
export const isPublicHost = (host: string): boolean => {
  const normalized = stripBrackets(host.toLowerCase());
  if (!normalized) return false;
  if (normalized === "localhost" || normalized.endsWith(".localhost")) return false;

  const family = isIP(normalized);
  if (family === 4) return !PRIVATE_IPV4_PATTERNS.some((pattern) => pattern.test(normalized));
  if (family === 6) return !PRIVATE_IPV6_PATTERNS.some((pattern) => pattern.test(normalized));
  return true;
};

export const isPublicUrl = (url: string): boolean => {
  try {
    const parsed = new URL(url);
    return ALLOWED_SCHEMES.has(parsed.protocol) && isPublicHost(parsed.hostname);
  } catch {
    return false;
  }
};

export class DomainValidator {
  private readonly domains: string[];
  private readonly minPathSegments: number;
  private readonly minUrlLength: number;
  private readonly maxUrlLength: number;

  public constructor(config: DomainValidatorConfig) {
    this.domains = [...new Set(config.supportedDomains.map(stripWww).filter(Boolean))];
    this.minPathSegments = Math.max(0, config.minPathSegments ?? 1);
    this.minUrlLength = config.minUrlLength ?? 10;
    this.maxUrlLength = config.maxUrlLength ?? 2000;
  }

  public supportedDomains(): string[] {
    return [...this.domains];
  }

  /** Returns the allow-listed domain the host belongs to, or null. */
  public matchDomain(host: string): string | null {
    const normalized = stripWww(host);
    for (const domain of this.domains) {
      if (normalized === domain || normalized.endsWith(`.${domain}`)) return domain;
    }
    return null;
  }

  public isAllowedHost(host: string): boolean {
    return this.matchDomain(host) !== null;
  }

  public validate(rawUrl: string): NormalizedTarget {
    const trimmed = typeof rawUrl === "string" ? rawUrl.trim() : "";
    if (trimmed.length < this.minUrlLength || trimmed.length > this.maxUrlLength) {
      throw new InvalidUrlError("malformed_url", { length: trimmed.length });
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw new InvalidUrlError("malformed_url", { url: trimmed });
    }

    if (!ALLOWED_SCHEMES.has(parsed.protocol) || !parsed.hostname) {
      throw new InvalidUrlError("malformed_url", { url: trimmed, scheme: parsed.protocol });
    }

    const host = parsed.hostname.toLowerCase();
    const domain = this.matchDomain(host);
    if (!domain) {
      throw new InvalidUrlError("unsupported_domain", {
        host,
        supported_domains: this.supportedDomains(),
      });
    }

    const pathSegments = parsed.pathname.split("/").filter(Boolean);
    if (pathSegments.length < this.minPathSegments) {
      throw new InvalidUrlError("homepage_not_allowed", {
        url: trimmed,
        min_path_segments: this.minPathSegments,
      });
    }

    parsed.hash = "";
    return {
      url: parsed.toString(),
      host,
      domain,
      pathSegments,
    };
  }
}
