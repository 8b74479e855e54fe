/**
 * Routing Module Types
 *
 * Shared types for provider selection and request execution.
 */

import type { ProviderAdapter } from "../types/provider.js";
import type { RoutingStrategy } from "../types/strategy.js";
import type { ProviderRegistry } from "../state/registry.js";
import type { StatsCollector } from "../stats/collector.js";
import type { DebugLogger } from "../utils/debug.js";

/**
 * Per-request limits on which providers are tried, and in what order
 */
export interface ProviderScope {
  /** Only these ids may be tried; null when unrestricted */
  allowed: ReadonlySet<string> | null;
  /** Tried ahead of the strategy's ranking, in this order */
  preferred: readonly string[];
}

/**
 * Dependencies required for provider selection
 */
export interface SelectionDependencies {
  /** Registry holding provider state */
  registry: ProviderRegistry;
  /** Routing strategy for selection logic */
  strategy: RoutingStrategy;
  /** Time at which eligibility is evaluated */
  now: number;
  /** Request scope. Default: every provider, no preference */
  scope?: ProviderScope;
}

/**
 * Dependencies required for request execution
 */
export interface ExecutionDependencies {
  registry: ProviderRegistry;
  /** Adapter per enabled provider id */
  adapters: ReadonlyMap<string, ProviderAdapter>;
  /** Strategy for this request */
  strategy: RoutingStrategy;
  /** Router-wide attempt ceiling */
  maxAttempts: number;
  stats: StatsCollector;
  logger: DebugLogger;
  /** Clock in epoch milliseconds */
  now: () => number;
}
