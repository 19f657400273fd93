/**
 * Exponential backoff with additive jitter.
 */

import { ValidationError } from "../errors/index.js";

/** Upper bound on the exponential part of a delay, in seconds. */
export const MAX_BACKOFF_SECONDS = 60;

/** Jitter is drawn uniformly from [0, JITTER_FACTOR * delay]. */
export const JITTER_FACTOR = 0.1;

/**
 * Returns the delay in seconds before retry number `attempt` (1-based):
 * `min(baseDelay * 2^(attempt-1), maxDelay)` plus up to 10% jitter.
 *
 * @example
 * ```typescript
 * calculateBackoff(3, 1, 60, () => 0); // 4
 * ```
 */
export function calculateBackoff(
  attempt: number,
  baseDelay: number,
  maxDelay: number = MAX_BACKOFF_SECONDS,
  random: () => number = Math.random
): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new ValidationError(`Backoff attempt must be a positive integer, got ${attempt}`, {
      field: "attempt",
    });
  }
  if (!(baseDelay > 0)) {
    throw new ValidationError(`Backoff base delay must be positive, got ${baseDelay}`, {
      field: "baseDelay",
    });
  }

  const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
  const jitter = random() * JITTER_FACTOR * delay;
  return delay + jitter;
}
