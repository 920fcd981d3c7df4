/**
 * Unit tests for the retry engine
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { RetryExhaustedError, TimeoutError } from "../errors/index.js";
import {
  RetryAttemptEvent,
  RetryEngine,
  RetryStats,
  retryOperation,
  unwrapOutcome,
  withRetry,
} from "./engine.js";
import { createRetryPolicy } from "./policy.js";

describe("RetryEngine", () => {
  let sleep: Mock<(ms: number) => Promise<void>>;
  let events: RetryAttemptEvent[];
  let engine: RetryEngine;

  const policy = createRetryPolicy({
    maxAttempts: 3,
    baseDelayMs: 100,
    multiplier: 2,
    jitter: false,
    retryable: (error) => error instanceof TimeoutError,
  });

  beforeEach(() => {
    sleep = vi.fn(async (_ms: number) => {});
    events = [];
    engine = new RetryEngine({ sleep, onRetry: (event) => events.push(event) });
  });

  it("should return the first success without sleeping", async () => {
    const outcome = await engine.execute(async () => "ok", policy, "op");

    expect(outcome).toEqual({ succeeded: true, value: "ok", attemptsMade: 1, totalDelayMs: 0 });
    expect(sleep).not.toHaveBeenCalled();
    expect(engine.stats.totalRetries).toBe(0);
  });

  it("should retry retryable failures with backoff", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TimeoutError("op", 10))
      .mockRejectedValueOnce(new TimeoutError("op", 10))
      .mockResolvedValue("done");

    const outcome = await engine.execute(operation, policy, "op");

    expect(outcome).toEqual({
      succeeded: true,
      value: "done",
      attemptsMade: 3,
      totalDelayMs: 300,
    });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(engine.stats.totalRetries).toBe(2);
    expect(events.map((event) => [event.operation, event.attempt, event.delayMs])).toEqual([
      ["op", 0, 100],
      ["op", 1, 200],
    ]);
  });

  it("should report exhaustion with the last failure", async () => {
    const failures = [1, 2, 3, 4].map((n) => new TimeoutError(`op${n}`, 10));
    let call = 0;

    const outcome = await engine.execute(
      async () => {
        throw failures[call++];
      },
      policy,
      "op"
    );

    expect(outcome.succeeded).toBe(false);
    expect(outcome.attemptsMade).toBe(4);
    expect(outcome.totalDelayMs).toBe(700);
    if (!outcome.succeeded) {
      expect(outcome.lastFailure).toBe(failures[3]);
    }
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(engine.stats.totalRetries).toBe(3);
  });

  it("should re-throw non-retryable failures unchanged", async () => {
    const fatal = new Error("fatal");
    const operation = vi.fn(async () => {
      throw fatal;
    });

    await expect(engine.execute(operation, policy, "op")).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(engine.stats.totalRetries).toBe(0);
  });

  it("should make a single attempt when maxAttempts is 0", async () => {
    const once = createRetryPolicy({ ...policy, maxAttempts: 0 });
    const operation = vi.fn(async () => {
      throw new TimeoutError("op", 10);
    });

    const outcome = await engine.execute(operation, once, "op");

    expect(outcome.succeeded).toBe(false);
    expect(outcome.attemptsMade).toBe(1);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should count retries on shared stats", async () => {
    const stats = new RetryStats();
    const first = new RetryEngine({ stats, sleep });
    const second = new RetryEngine({ stats, sleep });
    const flaky = () => {
      let failed = false;
      return async () => {
        if (!failed) {
          failed = true;
          throw new TimeoutError("op", 10);
        }
        return 1;
      };
    };

    await first.execute(flaky(), policy);
    await second.execute(flaky(), policy);

    expect(stats.totalRetries).toBe(2);
    stats.reset();
    expect(stats.totalRetries).toBe(0);
  });
});

describe("unwrapOutcome", () => {
  it("should return the value of a success", () => {
    expect(unwrapOutcome({ succeeded: true, value: 5, attemptsMade: 1, totalDelayMs: 0 })).toBe(5);
  });

  it("should throw RetryExhaustedError for a failure", () => {
    const last = new TimeoutError("ping", 10);

    try {
      unwrapOutcome({ succeeded: false, lastFailure: last, attemptsMade: 2, totalDelayMs: 1 }, "ping");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RetryExhaustedError);
      if (error instanceof RetryExhaustedError) {
        expect(error.attempts).toBe(2);
        expect(error.lastFailure).toBe(last);
      }
    }
  });
});

describe("withRetry", () => {
  it("should wrap a function and forward its arguments", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const add = vi
      .fn(async (a: number, b: number) => a + b)
      .mockRejectedValueOnce(new TimeoutError("add", 10));
    const policy = createRetryPolicy({ baseDelayMs: 0, maxDelayMs: 0 });

    const retryingAdd = withRetry(add, policy, new RetryEngine({ sleep }), "add");

    await expect(retryingAdd(2, 3)).resolves.toBe(5);
    expect(add).toHaveBeenCalledTimes(2);
    expect(add).toHaveBeenLastCalledWith(2, 3);
  });
});

describe("retryOperation", () => {
  it("should throw RetryExhaustedError once attempts run out", async () => {
    const engine = new RetryEngine({ sleep: async () => {} });

    await expect(
      retryOperation(
        async () => {
          throw new Error("nope");
        },
        { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, operationName: "flaky", engine }
      )
    ).rejects.toThrow("Operation 'flaky' failed after 2 attempt(s): nope");
  });
});
