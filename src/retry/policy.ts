/**
 * Retry policy definition and validation
 */

import { z } from "zod";
import { PolicyInvalidError } from "../errors/index.js";

export type BackoffStrategy = "exponential" | "linear" | "constant";

export const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = [
  "exponential",
  "linear",
  "constant",
];

/**
 * Immutable retry policy. `maxAttempts` counts retries beyond the first try.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  readonly jitter: boolean;
  readonly jitterFraction: number;
  readonly strategy: BackoffStrategy;
  readonly retryable: (failure: unknown) => boolean;
}

export type RetryPolicyOptions = Partial<RetryPolicy>;

export const DEFAULT_RETRY_POLICY: Omit<RetryPolicy, "retryable"> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitter: true,
  jitterFraction: 0.1,
  strategy: "exponential",
};

export const retryPolicySchema = z
  .object({
    maxAttempts: z
      .number()
      .int("maxAttempts must be an integer")
      .min(0, "maxAttempts must be non-negative"),
    baseDelayMs: z
      .number()
      .finite()
      .min(0, "baseDelayMs must be non-negative"),
    maxDelayMs: z.number().finite(),
    multiplier: z.number().finite().positive("multiplier must be positive"),
    jitter: z.boolean(),
    jitterFraction: z
      .number()
      .min(0, "jitterFraction must be between 0 and 1")
      .max(1, "jitterFraction must be between 0 and 1"),
    strategy: z.enum(["exponential", "linear", "constant"]),
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: "maxDelayMs must be >= baseDelayMs",
    path: ["maxDelayMs"],
  });

const retryAll = (): boolean => true;

/**
 * Build a validated, frozen policy. Invalid values are rejected here so that
 * backoff computation never sees them.
 */
export function createRetryPolicy(options: RetryPolicyOptions = {}): RetryPolicy {
  const { retryable = retryAll, ...numeric } = options;
  const candidate = {
    ...DEFAULT_RETRY_POLICY,
    ...Object.fromEntries(
      Object.entries(numeric).filter(([, value]) => value !== undefined)
    ),
  };

  const parsed = retryPolicySchema.safeParse(candidate);
  if (!parsed.success) {
    throw new PolicyInvalidError(
      parsed.error.issues.map((issue) => issue.message)
    );
  }

  return Object.freeze({ ...parsed.data, retryable });
}
