/**
 * Retry Delays
 *
 * Delay calculation for the job orchestrator's retry loop:
 * - fixed: the same wait before every retry
 * - exponential: doubling waits with jitter, capped
 */

import type { BackoffStrategy } from '../schemas/index.js';

/**
 * Calculate delay with exponential backoff and jitter.
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt * (1 + random jitter))
 *
 * @param attempt - Retry number (0-indexed)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay cap
 * @param random - Random source in [0, 1)
 * @returns Delay in milliseconds
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);

  // Jitter (±25%)
  const jitter = 0.75 + random() * 0.5;

  return Math.min(exponentialDelay * jitter, maxDelayMs);
}

/**
 * Delay before the next attempt.
 *
 * @param strategy - Backoff strategy
 * @param attempts - Attempts already made (1 after the first failure)
 * @param baseDelayMs - Configured retry wait
 * @param maxDelayMs - Cap for exponential backoff
 */
export function retryDelayFor(
  strategy: BackoffStrategy,
  attempts: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  if (strategy === 'fixed') {
    return baseDelayMs;
  }
  return calculateBackoffDelay(Math.max(0, attempts - 1), baseDelayMs, maxDelayMs);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
