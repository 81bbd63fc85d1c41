/**
 * Tests for exponential backoff with jitter
 */

import { describe, it, expect, vi } from "vitest";
import {
  calculateBackoff,
  createBackoffProvider,
} from "../../../src/resilience/backoff.js";

describe("Backoff", () => {
  const config = { baseDelayMs: 100, jitterMaxMs: 300 };

  describe("calculateBackoff", () => {
    it("should double the base delay per attempt without jitter", () => {
      const noJitter = () => 0;

      expect(calculateBackoff(0, config, noJitter)).toBe(100);
      expect(calculateBackoff(1, config, noJitter)).toBe(200);
      expect(calculateBackoff(2, config, noJitter)).toBe(400);
      expect(calculateBackoff(3, config, noJitter)).toBe(800);
    });

    it("should add whole milliseconds of jitter", () => {
      expect(calculateBackoff(2, config, () => 0.5)).toBe(550);
      expect(calculateBackoff(0, config, () => 0.999)).toBe(399);
    });

    it("should not draw randomness when jitter is disabled", () => {
      const random = vi.fn(() => 0.7);

      expect(calculateBackoff(1, { baseDelayMs: 100, jitterMaxMs: 0 }, random)).toBe(200);
      expect(random).not.toHaveBeenCalled();
    });

    it("should never fall below the exponential term", () => {
      for (let attempt = 0; attempt <= 10; attempt++) {
        const floor = config.baseDelayMs * Math.pow(2, attempt);
        for (let sample = 0; sample < 50; sample++) {
          const delay = calculateBackoff(attempt, config);
          expect(delay).toBeGreaterThanOrEqual(floor);
          expect(delay).toBeLessThan(floor + config.jitterMaxMs);
        }
      }
    });
  });

  describe("createBackoffProvider", () => {
    it("should share one random source across calls", () => {
      const random = vi.fn().mockReturnValueOnce(0.1).mockReturnValueOnce(0.2);
      const provider = createBackoffProvider(config, random);

      expect(provider(1)).toBe(230);
      expect(provider(1)).toBe(260);
      expect(random).toHaveBeenCalledTimes(2);
    });
  });
});
