/**
 * Backoff delay calculation
 */

import { PolicyInvalidError } from "../errors/index.js";
import { RetryPolicy } from "./policy.js";

/**
 * Delay before the retry that follows attempt `attempt` (0-indexed).
 *
 * The strategy delay is capped at `maxDelayMs` first; jitter is applied to the
 * capped value and the result is clamped at zero.
 */
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new PolicyInvalidError([
      `attempt must be a non-negative integer, got ${attempt}`,
    ]);
  }

  let delay = Math.min(strategyDelay(attempt, policy), policy.maxDelayMs);

  if (policy.jitter && policy.jitterFraction > 0) {
    const range = delay * policy.jitterFraction;
    // uniform in [-range, +range]
    delay += (random() * 2 - 1) * range;
    delay = Math.max(0, delay);
  }

  return delay;
}

function strategyDelay(attempt: number, policy: RetryPolicy): number {
  switch (policy.strategy) {
    case "exponential":
      return policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
    case "linear":
      return policy.baseDelayMs * (attempt + 1);
    case "constant":
      return policy.baseDelayMs;
  }
}
