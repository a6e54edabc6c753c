// ABOUTME: Process-local rate limiting for the Deezer API (50 requests per 5 seconds).
// ABOUTME: Also owns the sleep used for retry backoff, so tests can skip real waits.

import { RATE_LIMITS } from '@albumsmith/config';

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class DeezerRateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;

  private requestCount = 0;
  private windowStart: number;
  private retryAfter: number | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? RATE_LIMITS.deezer.requestsPerWindow;
    this.windowMs = options.windowMs ?? RATE_LIMITS.deezer.windowMs;
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.windowStart = this.now();
  }

  /**
   * Acquire a token before making a Deezer API request.
   * Waits while in cooldown or when the current window is full.
   */
  async acquire(): Promise<void> {
    for (;;) {
      const now = this.now();

      if (this.retryAfter !== null && now < this.retryAfter) {
        const waitMs = this.retryAfter - now;
        console.log(`[Deezer] Rate limit cooldown, waiting ${waitMs}ms`);
        await this.sleepFn(waitMs);
        continue;
      }

      if (now - this.windowStart >= this.windowMs) {
        this.windowStart = now;
        this.requestCount = 0;
      }

      if (this.requestCount >= this.maxRequests) {
        const waitMs = this.windowMs - (now - this.windowStart);
        console.log(`[Deezer] Local rate limit reached (${this.requestCount}/${this.maxRequests}), waiting ${waitMs}ms`);
        await this.sleepFn(waitMs);
        continue;
      }

      this.requestCount += 1;
      return;
    }
  }

  /**
   * Record a rate-limit response and enter cooldown.
   */
  recordRateLimitResponse(retryAfterSeconds: number): void {
    console.log(`[Deezer] Rate limited, entering cooldown for ${retryAfterSeconds}s`);
    const now = this.now();
    this.requestCount = 0;
    this.windowStart = now;
    this.retryAfter = now + retryAfterSeconds * 1000;
  }

  getStats(): { requestCount: number; maxRequests: number; windowRemainingMs: number; inCooldown: boolean } {
    const now = this.now();
    return {
      requestCount: this.requestCount,
      maxRequests: this.maxRequests,
      windowRemainingMs: Math.max(0, this.windowMs - (now - this.windowStart)),
      inCooldown: this.retryAfter !== null && now < this.retryAfter,
    };
  }

  /** Backoff wait between retries */
  wait(ms: number): Promise<void> {
    return this.sleepFn(ms);
  }
}
