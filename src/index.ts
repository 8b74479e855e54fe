/**
 * failover-router
 *
 * A TypeScript library that routes text-generation requests across
 * interchangeable LLM providers with circuit breaking, rate-limit cooldowns
 * and configurable routing strategies.
 */

export const VERSION = "0.1.0";

// Export the router
export {
  createRouter,
  createRouterFromEnv,
  type Router,
  type ProviderInfo,
  type RouterFromEnvOptions,
} from "./router.js";

// Export all types
export * from "./types/index.js";

// Export registry loading
export * from "./config/index.js";

// Export provider adapters
export * from "./providers/index.js";

// Export routing strategies
export {
  createStrategy,
  createPriorityStrategy,
  createIntelligentStrategy,
  createRoundRobinStrategy,
  createFastestStrategy,
  createLeastUsedStrategy,
  AVAILABLE_STRATEGIES,
} from "./strategies/index.js";

// Export health tracking building blocks
export * from "./circuit-breaker/index.js";
export * from "./rate-limit/index.js";
export * from "./state/index.js";
export * from "./stats/index.js";

// Export the fallback loop
export * from "./routing/index.js";

// Export logging controls and helpers
export * from "./utils/index.js";
