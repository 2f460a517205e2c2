/**
 * Fixed-window rate limiting over an injected counter store.
 *
 * The limiter never waits: a request over the limit is answered at once.
 * The in-memory counter store suits single-process deployments; a shared
 * store (Redis INCR + PEXPIRE, for instance) can replace it without touching
 * the pipeline.
 */

export interface CounterWindow {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Epoch milliseconds at which the window resets. */
  resetAt: number;
}

/** Key → count-with-TTL abstraction. */
export interface CounterStore {
  increment(key: string, windowMs: number): Promise<CounterWindow>;
}

export interface RateLimitOptions {
  /** Maximum requests allowed within the window. Default: 60 */
  maxRequests?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

export class MemoryCounterStore implements CounterStore {
  private counters = new Map<string, CounterWindow>();
  private readonly cleanupInterval: ReturnType<typeof setInterval>;

  constructor(
    pruneIntervalMs = 60_000,
    private readonly now: () => number = Date.now,
  ) {
    // Periodic cleanup of expired entries to prevent memory growth
    this.cleanupInterval = setInterval(() => this.prune(), pruneIntervalMs);
    // Allow the process to exit while the store is alive
    this.cleanupInterval.unref();
  }

  async increment(key: string, windowMs: number): Promise<CounterWindow> {
    const now = this.now();
    const existing = this.counters.get(key);
    if (!existing || existing.resetAt <= now) {
      const fresh = { count: 1, resetAt: now + windowMs };
      this.counters.set(key, fresh);
      return { ...fresh };
    }
    existing.count += 1;
    return { ...existing };
  }

  /** Drop windows that have already reset. */
  prune(): void {
    const now = this.now();
    for (const [key, window] of this.counters) {
      if (window.resetAt <= now) this.counters.delete(key);
    }
  }

  get size(): number {
    return this.counters.size;
  }

  close(): void {
    clearInterval(this.cleanupInterval);
  }
}

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;

  constructor(
    private readonly counters: CounterStore,
    options?: RateLimitOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.maxRequests = options?.maxRequests ?? 60;
    this.windowMs = options?.windowMs ?? 60_000;
  }

  /** Count one request against `key` and decide it. */
  async check(key: string): Promise<RateLimitDecision> {
    const window = await this.counters.increment(key, this.windowMs);
    if (window.count > this.maxRequests) {
      return { allowed: false, retryAfterMs: Math.max(0, window.resetAt - this.now()) };
    }
    return { allowed: true, remaining: this.maxRequests - window.count };
  }
}
