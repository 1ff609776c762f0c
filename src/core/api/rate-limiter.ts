/**
 * Token bucket rate limiter for calls to the tenant API.
 *
 * One bucket per API client, shared by every module of a run. State is
 * in memory and lives as long as the client.
 */

import type { SleepFn } from './sleep.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RateLimiterConfig {
  /** Sustained call rate. */
  requestsPerMinute: number;
  /** Token bucket capacity. */
  burstSize: number;
}

export const DEFAULT_RATE_LIMIT: Readonly<RateLimiterConfig> = {
  requestsPerMinute: 600,
  burstSize: 20,
};

export type RateLimitResult = { allowed: true } | { allowed: false; retryAfterMs: number };

// ---------------------------------------------------------------------------
// RateLimiter
// ---------------------------------------------------------------------------

export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly now: () => number;
  private tokens: number;
  private lastRefill: number;

  constructor(config: RateLimiterConfig, now: () => number = Date.now) {
    validateConfig(config);
    this.config = config;
    this.now = now;
    this.tokens = config.burstSize;
    this.lastRefill = now();
  }

  /** Take one token if available, otherwise report the wait. */
  tryConsume(): RateLimitResult {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return { allowed: true };
    }

    const tokensPerMs = this.config.requestsPerMinute / 60_000;
    return { allowed: false, retryAfterMs: Math.ceil((1 - this.tokens) / tokensPerMs) };
  }

  /** Wait until a token is available, then take it. */
  async acquire(sleep: SleepFn, signal?: AbortSignal): Promise<void> {
    for (;;) {
      const result = this.tryConsume();
      if (result.allowed) return;
      await sleep(result.retryAfterMs, signal);
    }
  }

  /** Whole tokens currently in the bucket. */
  available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;

    const tokensPerMs = this.config.requestsPerMinute / 60_000;
    this.tokens = Math.min(this.tokens + elapsed * tokensPerMs, this.config.burstSize);
    this.lastRefill = now;
  }
}

function validateConfig(config: RateLimiterConfig): void {
  if (config.requestsPerMinute <= 0) {
    throw new Error('requestsPerMinute must be positive');
  }
  if (config.burstSize <= 0) {
    throw new Error('burstSize must be positive');
  }
}
