/**
 * Rate Limit Module
 *
 * Cooldown tracking for providers that signalled a rate limit.
 */

export { createRateLimiter, computeCooldownMs } from "./limiter.js";
export type { RateLimiter } from "./limiter.js";
