import { describe, it, expect, beforeEach } from "vitest";
import { createRateLimiter, computeCooldownMs, type RateLimiter } from "./limiter.js";
import { createInitialState } from "../state/utils.js";
import { evaluateStatus, type ProviderState } from "../types/provider.js";

const COOLDOWN_MS = 300_000;

describe("RateLimiter", () => {
  let limiter: RateLimiter;
  let state: ProviderState;

  beforeEach(() => {
    limiter = createRateLimiter({ cooldownMs: COOLDOWN_MS, honorRetryAfter: true });
    state = createInitialState(true);
  });

  describe("recordRateLimit", () => {
    it("puts the provider aside for the cooldown", () => {
      const until = limiter.recordRateLimit(state, 1000);

      expect(until).toBe(1000 + COOLDOWN_MS);
      expect(state.rateLimitedUntil).toBe(1000 + COOLDOWN_MS);
      expect(evaluateStatus(state, 1000)).toBe("rate_limited");
      expect(limiter.isLimited(state, 1000 + COOLDOWN_MS - 1)).toBe(true);
      expect(evaluateStatus(state, 1000 + COOLDOWN_MS)).toBe("active");
    });

    it("does not touch the consecutive failure count", () => {
      state.consecutiveFailures = 3;

      limiter.recordRateLimit(state, 1000);

      expect(state.consecutiveFailures).toBe(3);
    });

    it("honors a longer Retry-After", () => {
      expect(limiter.recordRateLimit(state, 0, 900_000)).toBe(900_000);
    });

    it("ignores a shorter Retry-After", () => {
      expect(limiter.recordRateLimit(state, 0, 10_000)).toBe(COOLDOWN_MS);
    });

    it("keeps an open circuit open", () => {
      state.circuitOpenUntil = 600_000;

      const until = limiter.recordRateLimit(state, 0);

      expect(until).toBe(COOLDOWN_MS);
      expect(state.circuitOpenUntil).toBe(600_000);
      expect(evaluateStatus(state, 0)).toBe("circuit_open");
      expect(evaluateStatus(state, 600_000)).toBe("active");
    });

    it("never shortens a running cooldown", () => {
      limiter.recordRateLimit(state, 0, 900_000);
      limiter.recordRateLimit(state, 1000);

      expect(state.rateLimitedUntil).toBe(900_000);
    });
  });

  describe("computeCooldownMs", () => {
    it("uses the fixed cooldown when Retry-After is not honored", () => {
      expect(
        computeCooldownMs({ cooldownMs: COOLDOWN_MS, honorRetryAfter: false }, 900_000)
      ).toBe(COOLDOWN_MS);
    });
  });
});
