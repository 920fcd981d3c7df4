export { calculateDelay } from "./backoff.js";
export {
  BACKOFF_STRATEGIES,
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  retryPolicySchema,
} from "./policy.js";
export type { BackoffStrategy, RetryPolicy, RetryPolicyOptions } from "./policy.js";
export {
  RetryEngine,
  RetryStats,
  retryOperation,
  unwrapOutcome,
  withRetry,
} from "./engine.js";
export type { RetryAttemptEvent, RetryEngineOptions, RetryOutcome } from "./engine.js";
