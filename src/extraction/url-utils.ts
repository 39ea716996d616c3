export const VIDEO_EXTENSIONS = ["mp4", "m3u8", "mkv", "avi", "webm"] as const;

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);
const IGNORED_FRAME_SCHEMES = /^\s*(about|javascript|data|blob):/i;
const VIDEO_EXTENSION_PATTERN = new RegExp(`\\.(?:${VIDEO_EXTENSIONS.join("|")})(?:$|[?#&/])`, "i");

/** Undoes the escaping URLs pick up inside JSON strings, JS literals and HTML attributes. */
export const unescapeEmbeddedUrl = (value: string): string =>
  value
    .trim()
    .replace(/\\u002[fF]/g, "/")
    .replace(/\\u0026/g, "&")
    .replace(/\\\//g, "/")
    .replace(/&amp;/g, "&")
    .replace(/&#x2[fF];/g, "/")
    .replace(/&#47;/g, "/");

export const isIgnoredFrameUrl = (raw: string): boolean => IGNORED_FRAME_SCHEMES.test(raw);

/**
 * Resolves a URL found on `baseUrl` to an absolute http(s) URL without
 * fragment. Returns null for anything that cannot be fetched over http.
 */
export const resolveCandidateUrl = (raw: string, baseUrl: string): string | null => {
  const cleaned = unescapeEmbeddedUrl(raw);
  if (!cleaned || isIgnoredFrameUrl(cleaned)) return null;

  try {
    const parsed = new URL(cleaned, baseUrl);
    if (!ALLOWED_PROTOCOLS.has(parsed.protocol) || !parsed.hostname) return null;
    parsed.hash = "";
    return parsed.toString();
  } catch {
    return null;
  }
};

/** Key under which two discoveries of the same resource collapse into one. */
export const normalizedUrlKey = (url: string): string => {
  try {
    const parsed = new URL(url);
    parsed.hash = "";
    parsed.hostname = parsed.hostname.toLowerCase();
    return parsed.toString();
  } catch {
    return url.trim();
  }
};

export const hasVideoExtension = (url: string): boolean => VIDEO_EXTENSION_PATTERN.test(url);

export const looksLikeStreamUrl = (url: string): boolean =>
  hasVideoExtension(url) || /\.m3u8/i.test(url) || /\/hls\//i.test(url);

export const hostOf = (url: string): string | null => {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
};
