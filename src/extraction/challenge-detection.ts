import type { ChallengeDetectionResult } from "./types";

type ChallengeKind = NonNullable<ChallengeDetectionResult["kind"]>;

export interface ChallengeInput {
  html: string;
  url?: string | null;
  statusCode?: number | null;
}

interface ChallengeSignal {
  kind: ChallengeKind;
  evidence: string;
  /** Body markers outweigh status codes and URLs when picking the kind. */
  weight: number;
  matches: (input: ChallengeInput) => boolean;
}

const SCAN_LIMIT = 120_000;

const bodyMarker = (kind: ChallengeKind, evidence: string, pattern: RegExp): ChallengeSignal => ({
  kind,
  evidence,
  weight: 2,
  matches: (input) => pattern.test(input.html.slice(0, SCAN_LIMIT)),
});

const statusCode = (status: number, kind: ChallengeKind): ChallengeSignal => ({
  kind,
  evidence: `http-status-${status}`,
  weight: 1,
  matches: (input) => input.statusCode === status,
});

const SIGNALS: readonly ChallengeSignal[] = [
  bodyMarker("captcha", "captcha marker", /\b(captcha|hcaptcha|recaptcha|turnstile|please verify you are human)\b/i),
  bodyMarker("rate_limit", "rate limit marker", /\b(too many requests|rate limit(?:ed)?|temporarily blocked)\b/i),
  bodyMarker(
    "js_challenge",
    "javascript challenge marker",
    /(cf-browser-verification|cf_chl_opt|challenge-platform|checking your browser|just a moment\.\.\.|ddos-guard)/i,
  ),
  bodyMarker("bot_check", "bot-check marker", /\b(verify your identity|security check|unusual traffic|are you a robot|access denied)\b/i),
  statusCode(403, "bot_check"),
  statusCode(429, "rate_limit"),
  statusCode(503, "bot_check"),
  {
    kind: "captcha",
    evidence: "challenge-url",
    weight: 1,
    matches: (input) => typeof input.url === "string" && /captcha|challenge/i.test(input.url),
  },
];

/**
 * Heuristic scan of a fetched page, or an error page, for anti-bot
 * interstitials. It explains failures and empty results; it never blocks
 * extraction.
 */
export const detectChallengeSignals = (input: ChallengeInput): ChallengeDetectionResult => {
  const matched = SIGNALS.filter((signal) => signal.matches(input));
  if (matched.length === 0) {
    return { blocked: false, kind: null, confidence: 0, evidence: [] };
  }

  const weightByKind = new Map<ChallengeKind, number>();
  for (const signal of matched) {
    weightByKind.set(signal.kind, (weightByKind.get(signal.kind) ?? 0) + signal.weight);
  }

  let kind: ChallengeKind = "unknown";
  let heaviest = 0;
  for (const [candidate, weight] of weightByKind) {
    if (weight > heaviest) {
      heaviest = weight;
      kind = candidate;
    }
  }

  return {
    blocked: true,
    kind,
    confidence: Math.min(1, 0.35 + matched.length * 0.2),
    evidence: matched.map((signal) => signal.evidence),
  };
};
