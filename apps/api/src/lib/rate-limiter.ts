interface WindowState {
  count: number;
  resetAtMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterSeconds: number;
}

/**
 * Fixed-window counter keyed by an arbitrary string. Expired windows are
 * dropped on access.
 */
export class FixedWindowRateLimiter {
  private readonly windowMs: number;
  private readonly maxEvents: number;
  private readonly windows = new Map<string, WindowState>();

  constructor(input: { windowMs: number; maxEvents: number }) {
    this.windowMs = input.windowMs;
    this.maxEvents = input.maxEvents;
  }

  peek(key: string, now: Date): RateLimitDecision {
    const nowMs = now.getTime();
    const state = this.windows.get(key);
    if (!state || state.resetAtMs <= nowMs) {
      return {
        allowed: this.maxEvents > 0,
        remaining: this.maxEvents,
        retryAfterSeconds: 0
      };
    }

    const remaining = Math.max(0, this.maxEvents - state.count);
    return {
      allowed: remaining > 0,
      remaining,
      retryAfterSeconds: remaining > 0 ? 0 : Math.max(1, Math.ceil((state.resetAtMs - nowMs) / 1000))
    };
  }

  consume(key: string, now: Date): RateLimitDecision {
    const nowMs = now.getTime();
    this.dropExpired(nowMs);

    const decision = this.peek(key, now);
    if (!decision.allowed) {
      return decision;
    }

    const state = this.windows.get(key);
    if (state) {
      state.count += 1;
    } else {
      this.windows.set(key, { count: 1, resetAtMs: nowMs + this.windowMs });
    }

    return { ...decision, remaining: decision.remaining - 1 };
  }

  private dropExpired(nowMs: number) {
    for (const [key, state] of this.windows) {
      if (state.resetAtMs <= nowMs) {
        this.windows.delete(key);
      }
    }
  }
}
