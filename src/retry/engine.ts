/**
 * Retry engine: runs an operation under a RetryPolicy
 */

import { createChildLogger, LoggerInterface } from "../utils/logging.js";
import { RetryExhaustedError } from "../errors/index.js";
import { calculateDelay } from "./backoff.js";
import { RetryPolicy, RetryPolicyOptions, createRetryPolicy } from "./policy.js";

export type RetryOutcome<T> =
  | {
      succeeded: true;
      value: T;
      attemptsMade: number;
      totalDelayMs: number;
    }
  | {
      succeeded: false;
      lastFailure: unknown;
      attemptsMade: number;
      totalDelayMs: number;
    };

/**
 * Retry counter shared by every call an owner routes through its engine
 */
export class RetryStats {
  private retries = 0;

  get totalRetries(): number {
    return this.retries;
  }

  increment(): void {
    this.retries++;
  }

  reset(): void {
    this.retries = 0;
  }
}

export interface RetryAttemptEvent {
  operation: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryEngineOptions {
  stats?: RetryStats;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: LoggerInterface;
  /** Called before sleeping ahead of each retry */
  onRetry?: (event: RetryAttemptEvent) => void;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RetryEngine {
  readonly stats: RetryStats;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: LoggerInterface;
  private readonly onRetry?: (event: RetryAttemptEvent) => void;

  constructor(options: RetryEngineOptions = {}) {
    this.stats = options.stats ?? new RetryStats();
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createChildLogger({ module: "retry" });
    this.onRetry = options.onRetry;
  }

  /**
   * Attempt `operation` up to `policy.maxAttempts + 1` times.
   *
   * A failure the policy does not consider retryable is re-thrown as is; it
   * never turns into a failed outcome.
   */
  async execute<T>(
    operation: () => Promise<T>,
    policy: RetryPolicy,
    operationName: string = "operation"
  ): Promise<RetryOutcome<T>> {
    let totalDelayMs = 0;
    let lastFailure: unknown;

    for (let attempt = 0; attempt <= policy.maxAttempts; attempt++) {
      try {
        const value = await operation();

        if (attempt > 0) {
          this.logger.info(`${operationName} succeeded after retry`, {
            attempt: attempt + 1,
            totalDelayMs,
          });
        }

        return { succeeded: true, value, attemptsMade: attempt + 1, totalDelayMs };
      } catch (error) {
        if (!policy.retryable(error)) {
          this.logger.debug(`${operationName} failed with non-retryable error`, {
            attempt: attempt + 1,
            error: describe(error),
          });
          throw error;
        }

        lastFailure = error;

        if (attempt === policy.maxAttempts) {
          break;
        }

        const delayMs = calculateDelay(attempt, policy, this.random);
        this.logger.warn(`${operationName} failed, retrying`, {
          attempt: attempt + 1,
          maxAttempts: policy.maxAttempts + 1,
          delayMs: Math.round(delayMs),
          error: describe(error),
        });
        this.onRetry?.({ operation: operationName, attempt, delayMs, error });

        await this.sleep(delayMs);
        totalDelayMs += delayMs;
        this.stats.increment();
      }
    }

    this.logger.error(`${operationName} failed after all attempts`, {
      attempts: policy.maxAttempts + 1,
      error: describe(lastFailure),
    });

    return {
      succeeded: false,
      lastFailure,
      attemptsMade: policy.maxAttempts + 1,
      totalDelayMs,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Value of a successful outcome, or RetryExhaustedError carrying the last failure
 */
export function unwrapOutcome<T>(
  outcome: RetryOutcome<T>,
  operationName: string = "operation"
): T {
  if (outcome.succeeded) {
    return outcome.value;
  }
  throw new RetryExhaustedError(
    operationName,
    outcome.attemptsMade,
    outcome.lastFailure
  );
}

/**
 * Wrap an async function so every call runs under `policy`
 */
export function withRetry<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  policy: RetryPolicy,
  engine: RetryEngine = new RetryEngine(),
  operationName: string = fn.name || "operation"
): (...args: A) => Promise<T> {
  return async (...args: A) =>
    unwrapOutcome(
      await engine.execute(() => fn(...args), policy, operationName),
      operationName
    );
}

/**
 * One-off retry of `fn`; throws RetryExhaustedError when every attempt fails
 */
export async function retryOperation<T>(
  fn: () => Promise<T>,
  options: RetryPolicyOptions & { operationName?: string; engine?: RetryEngine } = {}
): Promise<T> {
  const { operationName = "operation", engine = new RetryEngine(), ...policyOptions } =
    options;
  const outcome = await engine.execute(fn, createRetryPolicy(policyOptions), operationName);
  return unwrapOutcome(outcome, operationName);
}
