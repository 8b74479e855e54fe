/**
 * State Module
 *
 * In-memory provider registry with lazily evaluated cooldowns.
 */

export { createProviderRegistry } from "./registry.js";
export type { ProviderRegistry, ProviderRegistryConfig } from "./registry.js";
export {
  calculateUpdatedLatency,
  createInitialState,
  DEFAULT_LATENCY_CONFIG,
  type LatencyConfig,
} from "./utils.js";
