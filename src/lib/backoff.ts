import type { BackoffConfig } from './config.js';

/**
 * Reconnect delay for the given zero-based attempt:
 * `min(max, base * 2^attempt * (1 + jitter * r))` with r in [0, 1).
 *
 * With jitter <= 1 the jittered delay of one attempt never exceeds the
 * unjittered delay of the next, so the sequence is non-decreasing up to the cap.
 */
export function computeBackoffDelay(
  attempt: number,
  backoff: BackoffConfig,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, Math.floor(attempt));
  // Past ~2^40 the product is far beyond any sane cap
  const exponential = backoff.base_ms * 2 ** Math.min(exponent, 40);
  const r = Math.min(Math.max(random(), 0), 1);
  const jittered = exponential * (1 + backoff.jitter * r);
  return Math.round(Math.min(backoff.max_ms, jittered));
}
