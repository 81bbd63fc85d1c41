/**
 * Exponential backoff with additive jitter
 *
 * @module resilience/backoff
 */

/**
 * BackoffConfig - Inputs of the backoff calculation (milliseconds)
 */
export interface BackoffConfig {
  baseDelayMs: number;
  jitterMaxMs: number;
}

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Computes the wait before a retry from the retry number
 */
export type BackoffProvider = (attempt: number) => number;

/**
 * Calculate backoff delay for a given attempt
 *
 * delay = baseDelayMs * 2^attempt + jitter, where jitter is a whole number of
 * milliseconds drawn uniformly from [0, jitterMaxMs). The jitter is additive,
 * so the result is never below the exponential term.
 *
 * @example
 * ```typescript
 * // attempt 1 with the defaults: 200ms plus 0-299ms of jitter
 * const delay = calculateBackoff(1, { baseDelayMs: 100, jitterMaxMs: 300 });
 * ```
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig,
  random: RandomSource = Math.random
): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter =
    config.jitterMaxMs > 0 ? Math.floor(random() * config.jitterMaxMs) : 0;

  return exponential + jitter;
}

/**
 * Create a backoff provider bound to one configuration
 *
 * The random source is shared by every call of the provider; it is not
 * reseeded per attempt.
 */
export function createBackoffProvider(
  config: BackoffConfig,
  random: RandomSource = Math.random
): BackoffProvider {
  return (attempt) => calculateBackoff(attempt, config, random);
}
