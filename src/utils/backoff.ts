/**
 * Exponential backoff with optional jitter.
 */

export interface BackoffOptions {
  /** Delay before the first retry. */
  baseMs: number;
  /** Upper bound for any single delay. */
  maxMs: number;
  /** Equal jitter: keep half the delay, randomize the other half. */
  jitter?: boolean;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function computeBackoff(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = options.baseMs * 2 ** exponent;
  const capped = Math.min(raw, options.maxMs);
  if (!options.jitter) return capped;
  const half = capped / 2;
  return Math.floor(half + random() * half);
}
