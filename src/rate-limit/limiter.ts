import type { RateLimitConfig } from "../types/config.js";
import type { ProviderState } from "../types/provider.js";
import { DEFAULT_CONFIG } from "../types/config.js";

/**
 * Rate-limit cooldown tracker
 *
 * Puts a provider that signalled a rate limit aside for a fixed cooldown
 * (or the provider's own Retry-After, when that is longer). Rate limits
 * are not failures of the provider, so the circuit breaker's consecutive
 * count and its deadline are left alone.
 */
export interface RateLimiter {
  readonly config: Readonly<RateLimitConfig>;
  /**
   * Start a cooldown
   *
   * @param retryAfterMs - Provider's Retry-After hint, if it sent one
   * @returns When the rate-limit cooldown ends
   */
  recordRateLimit(state: ProviderState, now: number, retryAfterMs?: number): number;
  /** Whether the provider is cooling down at `now` */
  isLimited(state: Readonly<ProviderState>, now: number): boolean;
}

/**
 * Cooldown length for one rate-limit signal
 */
export const computeCooldownMs = (
  config: Readonly<RateLimitConfig>,
  retryAfterMs?: number
): number =>
  config.honorRetryAfter && retryAfterMs !== undefined && retryAfterMs > config.cooldownMs
    ? retryAfterMs
    : config.cooldownMs;

export const createRateLimiter = (
  config: Partial<RateLimitConfig> = {}
): RateLimiter => {
  const resolved: RateLimitConfig = { ...DEFAULT_CONFIG.rateLimit, ...config };

  return {
    config: resolved,

    recordRateLimit: (state, now, retryAfterMs) => {
      const until = now + computeCooldownMs(resolved, retryAfterMs);
      if (state.disabled) {
        return until;
      }

      // Never shorten a cooldown that is still running
      state.rateLimitedUntil =
        state.rateLimitedUntil !== null && now < state.rateLimitedUntil
          ? Math.max(state.rateLimitedUntil, until)
          : until;
      return state.rateLimitedUntil;
    },

    isLimited: (state, now) =>
      state.rateLimitedUntil !== null && now < state.rateLimitedUntil,
  };
};
