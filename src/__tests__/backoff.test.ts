/**
 * Tests for backoff delays.
 */

import { describe, expect, it } from "vitest";
import { calculateBackoff, JITTER_FACTOR } from "../transport/backoff.js";
import { ValidationError } from "../errors/index.js";

describe("calculateBackoff", () => {
  it("should double the delay per attempt without jitter", () => {
    const noJitter = () => 0;
    expect(calculateBackoff(1, 1, 60, noJitter)).toBe(1);
    expect(calculateBackoff(2, 1, 60, noJitter)).toBe(2);
    expect(calculateBackoff(3, 1, 60, noJitter)).toBe(4);
    expect(calculateBackoff(4, 0.5, 60, noJitter)).toBe(4);
  });

  it("should cap the exponential part at maxDelay", () => {
    expect(calculateBackoff(10, 1, 60, () => 0)).toBe(60);
    expect(calculateBackoff(5, 2, 10, () => 0)).toBe(10);
  });

  it("should add at most 10% jitter", () => {
    expect(calculateBackoff(2, 1, 60, () => 0.5)).toBeCloseTo(2.1, 10);
    expect(calculateBackoff(10, 1, 60, () => 0.999)).toBeLessThan(60 * (1 + JITTER_FACTOR));
  });

  it("should stay within [base * 2^(n-1), 1.1 * base * 2^(n-1)] with real randomness", () => {
    for (let attempt = 1; attempt <= 6; attempt++) {
      const floor = Math.pow(2, attempt - 1);
      for (let sample = 0; sample < 20; sample++) {
        const delay = calculateBackoff(attempt, 1);
        expect(delay).toBeGreaterThanOrEqual(floor);
        expect(delay).toBeLessThanOrEqual(floor * 1.1);
      }
    }
  });

  describe("validation", () => {
    it("should reject attempts below 1", () => {
      expect(() => calculateBackoff(0, 1)).toThrow(ValidationError);
      expect(() => calculateBackoff(-2, 1)).toThrow(ValidationError);
    });

    it("should reject fractional attempts", () => {
      expect(() => calculateBackoff(1.5, 1)).toThrow(ValidationError);
    });

    it("should reject a non-positive base delay", () => {
      expect(() => calculateBackoff(1, 0)).toThrow(ValidationError);
      expect(() => calculateBackoff(1, -1)).toThrow("Backoff base delay must be positive, got -1");
    });
  });
});
