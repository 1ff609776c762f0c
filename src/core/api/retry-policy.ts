/**
 * Retry state machine for API calls.
 *
 *   Attempt ──ok──────────────────────────▶ Done
 *      │
 *      └─retriable failure─▶ planRetry ──▶ Backoff(delayMs) ──▶ Attempt
 *                                 │
 *                                 └──────▶ Fail(reason)
 *
 * `planRetry` is pure: given the policy and the failed attempt it
 * returns the next transition. No jitter, so every budget is
 * deterministic under test.
 */

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  /** Upper bound on time spent in the call, backoff sleeps included. */
  maxElapsedMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 5,
  maxElapsedMs: 60_000,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  multiplier: 2,
};

export type RetryFailReason = 'not-retriable' | 'attempts-exhausted' | 'budget-exhausted';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; reason: RetryFailReason };

/** Facts about the attempt that just failed. */
export interface AttemptFailure {
  /** 1-based number of the failed attempt. */
  attempt: number;
  /** Time since the first attempt started. */
  elapsedMs: number;
  retriable: boolean;
  /** Delay the provider asked for, if any. */
  hintMs?: number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.multiplier ** (attempt - 1));
}

export function planRetry(policy: RetryPolicy, failure: AttemptFailure): RetryDecision {
  if (!failure.retriable) {
    return { action: 'fail', reason: 'not-retriable' };
  }
  if (failure.attempt >= policy.maxAttempts) {
    return { action: 'fail', reason: 'attempts-exhausted' };
  }

  const delayMs = Math.max(backoffDelay(policy, failure.attempt), failure.hintMs ?? 0);
  if (failure.elapsedMs + delayMs > policy.maxElapsedMs) {
    return { action: 'fail', reason: 'budget-exhausted' };
  }

  return { action: 'retry', delayMs };
}

/**
 * Read the provider's wait hint from response headers (lower-cased keys).
 * `retry-after` is in seconds; `x-rate-limit-reset` is an epoch second.
 */
export function retryHintMs(headers: Record<string, string>, nowMs: number): number | undefined {
  const retryAfter = headers['retry-after'];
  if (retryAfter !== undefined && /^\d+$/.test(retryAfter.trim())) {
    return parseInt(retryAfter, 10) * 1000;
  }

  const reset = headers['x-rate-limit-reset'];
  if (reset !== undefined && /^\d+$/.test(reset.trim())) {
    return Math.max(0, parseInt(reset, 10) * 1000 - nowMs);
  }

  return undefined;
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error('retry.maxAttempts must be a positive integer');
  }
  if (policy.maxElapsedMs < 0) {
    throw new Error('retry.maxElapsedMs must not be negative');
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < policy.baseDelayMs) {
    throw new Error('retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
  }
  if (policy.multiplier < 1) {
    throw new Error('retry.multiplier must be at least 1');
  }
}
