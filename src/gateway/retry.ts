/**
 * Retry decisions for failed completion and delivery attempts.
 */

import { computeBackoff } from "../utils/backoff.js";
import type { DispatchError } from "../core/errors.js";

export interface RetryPolicyOptions {
  /** Total attempts (first try included) for transient failures. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound on a server-requested Retry-After wait. */
  rateLimitCapMs: number;
  maxRateLimitRetries: number;
}

export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: string };

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  rateLimitCapMs: 60_000,
  maxRateLimitRetries: 5,
};

export class RetryPolicy {
  readonly options: RetryPolicyOptions;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
  }

  /**
   * `attempt` is the 1-based count of failures so far in the error's budget:
   * rate limits are counted separately from every other failure.
   */
  decide(error: DispatchError, attempt: number): RetryDecision {
    const o = this.options;

    if (error.source === "completion") {
      switch (error.kind) {
        case "fatal":
          return { retry: false, reason: "fatal" };
        case "rate_limited":
          if (attempt > o.maxRateLimitRetries) return { retry: false, reason: "rate_limit_exhausted" };
          return { retry: true, delayMs: Math.min(error.retryAfterMs, o.rateLimitCapMs) };
        case "transient":
        case "timeout":
          return this.backoff(attempt);
      }
    }

    switch (error.kind) {
      case "disconnected":
        return this.backoff(attempt);
      case "send_failed":
        return error.retryable ? this.backoff(attempt) : { retry: false, reason: "send_rejected" };
      case "timeout":
        // the bridge may already have delivered
        return { retry: false, reason: "send_timeout" };
    }
  }

  private backoff(attempt: number): RetryDecision {
    const o = this.options;
    if (attempt >= o.maxAttempts) return { retry: false, reason: "attempts_exhausted" };
    return {
      retry: true,
      delayMs: computeBackoff(attempt, { baseMs: o.baseDelayMs, maxMs: o.maxDelayMs }),
    };
  }
}
