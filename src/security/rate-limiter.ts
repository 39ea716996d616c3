export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
  limit: number;
  windowMs: number;
}

interface WindowState {
  windowStart: number;
  count: number;
}

export interface FixedWindowRateLimiterConfig {
  windowMs: number;
  limit: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Per-requester fixed window counter with lazy expiry.
 *
 * `allow` checks and increments in one synchronous step, so concurrent
 * extraction calls from the same requester cannot both take the last slot.
 * A rejected call leaves the window untouched.
 *
 * Past `maxEntries`, expired windows are swept out. A window still in
 * progress is never dropped.
 */
export class FixedWindowRateLimiter {
  private readonly windowMs: number;
  private readonly limit: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly states = new Map<string, WindowState>();
  private nextSweepAt = 0;

  public constructor(config: FixedWindowRateLimiterConfig) {
    this.windowMs = Math.max(1, config.windowMs);
    this.limit = Math.max(1, config.limit);
    this.maxEntries = Math.max(100, config.maxEntries ?? 5000);
    this.now = config.now ?? Date.now;
  }

  public allow(requesterId: string): RateLimitDecision {
    const now = this.now();
    const state = this.ensureState(this.normalizeKey(requesterId), now);
    this.expireIfElapsed(state, now);

    if (state.count >= this.limit) {
      return this.decide(false, state, now);
    }

    state.count += 1;
    return this.decide(true, state, now);
  }

  public remaining(requesterId: string): number {
    const state = this.states.get(this.normalizeKey(requesterId));
    if (!state) return this.limit;
    if (this.now() - state.windowStart >= this.windowMs) return this.limit;
    return Math.max(0, this.limit - state.count);
  }

  public reset(requesterId: string): void {
    this.states.delete(this.normalizeKey(requesterId));
  }

  public size(): number {
    return this.states.size;
  }

  private decide(allowed: boolean, state: WindowState, now: number): RateLimitDecision {
    return {
      allowed,
      remaining: Math.max(0, this.limit - state.count),
      retryAfterMs: allowed ? 0 : Math.max(0, this.windowMs - (now - state.windowStart)),
      limit: this.limit,
      windowMs: this.windowMs,
    };
  }

  private expireIfElapsed(state: WindowState, now: number): void {
    if (now - state.windowStart >= this.windowMs) {
      state.windowStart = now;
      state.count = 0;
    }
  }

  private normalizeKey(key: string): string {
    return key.trim() || "anonymous";
  }

  private ensureState(key: string, now: number): WindowState {
    const existing = this.states.get(key);
    if (existing) return existing;

    const created: WindowState = { windowStart: now, count: 0 };
    this.states.set(key, created);
    this.sweepExpired(now);
    return created;
  }

  /** Nothing can expire before `nextSweepAt`, so the scan runs at most once per expiry. */
  private sweepExpired(now: number): void {
    if (this.states.size <= this.maxEntries || now < this.nextSweepAt) return;

    let earliestExpiry = Number.POSITIVE_INFINITY;
    for (const [key, state] of this.states) {
      const expiresAt = state.windowStart + this.windowMs;
      if (expiresAt <= now) {
        this.states.delete(key);
      } else {
        earliestExpiry = Math.min(earliestExpiry, expiresAt);
      }
    }
    this.nextSweepAt = earliestExpiry;
  }
}
