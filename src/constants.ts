export const DEFAULT_SUPPORTED_DOMAINS: readonly string[] = [
  "phimmoi.net",
  "fimplus.org",
  "phim3s.info",
  "motphim.net",
  "xemphim.app",
  "phimhay.org",
  "bilutv.org",
  "kkphim.vip",
  "phim1080.org",
  "hdviet.tv",
  "thuvienhd.com",
  "phimkk.com",
  "luotphim.org",
  "vuviphim.org",
  "phimdinhcao.com",
  "lauphim.tv",
];

export const DEFAULT_USER_AGENTS: readonly string[] = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
];

export const DEFAULT_PAGE_HEADERS: Readonly<Record<string, string>> = {
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "accept-language": "vi-VN,vi;q=0.9,en;q=0.8",
  "cache-control": "no-cache",
  "upgrade-insecure-requests": "1",
};
