/**
 * Unit tests for backoff delay calculation
 */

import { describe, it, expect } from "vitest";
import { PolicyInvalidError } from "../errors/index.js";
import { calculateDelay } from "./backoff.js";
import { createRetryPolicy } from "./policy.js";

describe("calculateDelay", () => {
  const noJitter = { baseDelayMs: 100, multiplier: 2, jitter: false };

  it("should grow exponentially", () => {
    const policy = createRetryPolicy(noJitter);

    expect([0, 1, 2, 3].map((attempt) => calculateDelay(attempt, policy))).toEqual([
      100, 200, 400, 800,
    ]);
  });

  it("should cap at maxDelayMs", () => {
    const policy = createRetryPolicy({ ...noJitter, maxDelayMs: 300 });

    expect(calculateDelay(2, policy)).toBe(300);
    expect(calculateDelay(100, policy)).toBe(300);
  });

  it("should grow linearly", () => {
    const policy = createRetryPolicy({ ...noJitter, strategy: "linear" });

    expect(calculateDelay(0, policy)).toBe(100);
    expect(calculateDelay(2, policy)).toBe(300);
  });

  it("should stay constant", () => {
    const policy = createRetryPolicy({ ...noJitter, strategy: "constant" });

    expect(calculateDelay(0, policy)).toBe(100);
    expect(calculateDelay(5, policy)).toBe(100);
  });

  it("should apply jitter within the configured fraction", () => {
    const policy = createRetryPolicy({ baseDelayMs: 1000, jitterFraction: 0.1 });

    expect(calculateDelay(0, policy, () => 0)).toBe(900);
    expect(calculateDelay(0, policy, () => 0.5)).toBe(1000);
    expect(calculateDelay(0, policy, () => 1)).toBe(1100);
  });

  it("should keep jittered delays within the band", () => {
    const policy = createRetryPolicy({ baseDelayMs: 100, jitterFraction: 0.25 });

    for (const r of [0, 0.1, 0.37, 0.5, 0.82, 0.999]) {
      for (const attempt of [0, 1, 2, 3]) {
        const d = Math.min(100 * 2 ** attempt, policy.maxDelayMs);
        const delay = calculateDelay(attempt, policy, () => r);
        expect(delay).toBeGreaterThanOrEqual(d * 0.75);
        expect(delay).toBeLessThanOrEqual(d * 1.25);
      }
    }
  });

  it("should jitter the capped delay", () => {
    const policy = createRetryPolicy({
      baseDelayMs: 1000,
      maxDelayMs: 2000,
      jitterFraction: 0.5,
    });

    expect(calculateDelay(4, policy, () => 1)).toBe(3000);
  });

  it("should never return a negative delay", () => {
    const policy = createRetryPolicy({ baseDelayMs: 1000, jitterFraction: 1 });

    expect(calculateDelay(0, policy, () => 0)).toBe(0);
  });

  it("should ignore the random source when jitter is off", () => {
    const policy = createRetryPolicy(noJitter);

    expect(calculateDelay(1, policy, () => 0)).toBe(200);
  });

  it("should reject negative or fractional attempts", () => {
    const policy = createRetryPolicy(noJitter);

    expect(() => calculateDelay(-1, policy)).toThrow(PolicyInvalidError);
    expect(() => calculateDelay(1.5, policy)).toThrow(
      "Invalid retry policy: attempt must be a non-negative integer, got 1.5"
    );
  });
});
