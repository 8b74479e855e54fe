import { describe, it, expect, beforeEach } from "vitest";
import { createCircuitBreaker, type CircuitBreaker } from "./breaker.js";
import { createInitialState } from "../state/utils.js";
import { evaluateStatus, type ProviderState } from "../types/provider.js";

const COOLDOWN_MS = 600_000;

describe("CircuitBreaker", () => {
  let breaker: CircuitBreaker;
  let state: ProviderState;

  beforeEach(() => {
    breaker = createCircuitBreaker({ failureThreshold: 5, cooldownMs: COOLDOWN_MS });
    state = createInitialState(true);
  });

  // ─────────────────────────────────────────────────────────────────
  // Opening
  // ─────────────────────────────────────────────────────────────────

  describe("recordFailure", () => {
    it("stays closed below the threshold", () => {
      for (let i = 0; i < 4; i++) {
        expect(breaker.recordFailure(state, 1000)).toBe(false);
      }

      expect(state.consecutiveFailures).toBe(4);
      expect(evaluateStatus(state, 1000)).toBe("active");
    });

    it("opens on the fifth consecutive failure", () => {
      for (let i = 0; i < 4; i++) {
        breaker.recordFailure(state, 1000);
      }

      expect(breaker.recordFailure(state, 2000)).toBe(true);
      expect(evaluateStatus(state, 2000)).toBe("circuit_open");
      expect(state.circuitOpenUntil).toBe(2000 + COOLDOWN_MS);
      expect(breaker.isOpen(state, 2000 + COOLDOWN_MS - 1)).toBe(true);
    });

    it("leaves disabled providers alone", () => {
      state = createInitialState(false);

      expect(breaker.recordFailure(state, 1000)).toBe(false);
      expect(state.circuitOpenUntil).toBeNull();
      expect(state.consecutiveFailures).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Recovery
  // ─────────────────────────────────────────────────────────────────

  describe("recovery", () => {
    beforeEach(() => {
      for (let i = 0; i < 5; i++) {
        breaker.recordFailure(state, 0);
      }
    });

    it("reads as closed once the cooldown has passed", () => {
      expect(breaker.isOpen(state, COOLDOWN_MS - 1)).toBe(true);
      expect(breaker.isOpen(state, COOLDOWN_MS)).toBe(false);
      expect(evaluateStatus(state, COOLDOWN_MS)).toBe("active");
    });

    it("re-opens on the first failure after the cooldown", () => {
      const now = COOLDOWN_MS + 10;

      expect(breaker.recordFailure(state, now)).toBe(true);
      expect(state.consecutiveFailures).toBe(6);
      expect(state.circuitOpenUntil).toBe(now + COOLDOWN_MS);
    });

    it("extends an open circuit without reporting it as opened again", () => {
      expect(breaker.recordFailure(state, 10)).toBe(false);
      expect(state.consecutiveFailures).toBe(6);
      expect(state.circuitOpenUntil).toBe(10 + COOLDOWN_MS);
    });

    it("closes on success and resets the count", () => {
      breaker.recordSuccess(state);

      expect(state.consecutiveFailures).toBe(0);
      expect(evaluateStatus(state, 0)).toBe("active");
      expect(state.circuitOpenUntil).toBeNull();
    });

    it("leaves a running rate-limit cooldown in place", () => {
      state.rateLimitedUntil = 300_000;

      breaker.recordSuccess(state);

      expect(state.rateLimitedUntil).toBe(300_000);
      expect(evaluateStatus(state, 1000)).toBe("rate_limited");
    });
  });

  it("resets the count on success before the threshold", () => {
    breaker.recordFailure(state, 0);
    breaker.recordFailure(state, 0);
    breaker.recordSuccess(state);

    for (let i = 0; i < 4; i++) {
      breaker.recordFailure(state, 0);
    }

    expect(evaluateStatus(state, 0)).toBe("active");
  });

  it("uses the default threshold of 5", () => {
    const defaults = createCircuitBreaker();

    expect(defaults.config).toEqual({ failureThreshold: 5, cooldownMs: 600_000 });
  });
});
