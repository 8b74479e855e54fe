import type { CircuitBreakerConfig } from "../types/config.js";
import type { ProviderState } from "../types/provider.js";
import { DEFAULT_CONFIG } from "../types/config.js";

/**
 * Circuit breaker over a provider's runtime state
 *
 * The breaker owns no state of its own; it applies transitions to the
 * ProviderState the registry holds. There is no timer: an open circuit
 * closes when `evaluateStatus` sees its cooldown has passed. Only
 * `circuitOpenUntil` is touched; a rate-limit cooldown runs on its own.
 *
 * ```
 * closed --(failures >= threshold)--> open --(now >= circuitOpenUntil)--> closed
 *   ^                                                                     |
 *   +---------------------------- success --------------------------------+
 * ```
 *
 * The consecutive count is only reset by a success, so the first failure
 * after a cooldown re-opens the circuit straight away.
 */
export interface CircuitBreaker {
  readonly config: Readonly<CircuitBreakerConfig>;
  /**
   * Count a failure
   *
   * A failure landing while the circuit is already open extends the
   * cooldown but does not count as opening it.
   *
   * @returns true when this failure opened (or re-opened) the circuit
   */
  recordFailure(state: ProviderState, now: number): boolean;
  /** Reset the failure count and close the circuit */
  recordSuccess(state: ProviderState): void;
  /** Whether the circuit is open at `now` */
  isOpen(state: Readonly<ProviderState>, now: number): boolean;
}

/**
 * Create a circuit breaker
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({ failureThreshold: 3 });
 * if (breaker.recordFailure(state, Date.now())) {
 *   logger.warn("circuit opened");
 * }
 * ```
 */
export const createCircuitBreaker = (
  config: Partial<CircuitBreakerConfig> = {}
): CircuitBreaker => {
  const resolved: CircuitBreakerConfig = {
    ...DEFAULT_CONFIG.circuitBreaker,
    ...config,
  };

  return {
    config: resolved,

    recordFailure: (state, now) => {
      if (state.disabled) {
        return false;
      }
      state.consecutiveFailures += 1;
      if (state.consecutiveFailures < resolved.failureThreshold) {
        return false;
      }

      // Never shorten a cooldown that is still running
      const wasOpen = state.circuitOpenUntil !== null && now < state.circuitOpenUntil;
      const pending = wasOpen ? (state.circuitOpenUntil ?? 0) : 0;
      state.circuitOpenUntil = Math.max(pending, now + resolved.cooldownMs);
      return !wasOpen;
    },

    recordSuccess: (state) => {
      state.consecutiveFailures = 0;
      state.circuitOpenUntil = null;
    },

    isOpen: (state, now) =>
      state.circuitOpenUntil !== null && now < state.circuitOpenUntil,
  };
};
