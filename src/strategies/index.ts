// Re-export strategy interface from types
export type {
  RoutingStrategy,
  RoutingContext,
  RankProvidersFn,
  SelectProviderFn,
  SelectionError,
  StrategyName,
} from "../types/strategy.js";

// Strategy implementations
export { createPriorityStrategy } from "./priority.js";
export {
  createIntelligentStrategy,
  calculateScore,
  calculateSpeedScore,
} from "./intelligent.js";
export { createRoundRobinStrategy } from "./round-robin.js";
export { createFastestStrategy } from "./fastest.js";
export { createLeastUsedStrategy, calculateUsage } from "./least-used.js";

import type { RoutingStrategy, StrategyName } from "../types/strategy.js";
import { STRATEGY_NAMES } from "../types/strategy.js";
import type { IntelligentScoringConfig } from "../types/config.js";
import { createPriorityStrategy } from "./priority.js";
import { createIntelligentStrategy } from "./intelligent.js";
import { createRoundRobinStrategy } from "./round-robin.js";
import { createFastestStrategy } from "./fastest.js";
import { createLeastUsedStrategy } from "./least-used.js";

/**
 * Create a routing strategy from a strategy name
 *
 * @param name - Strategy identifier
 * @param intelligent - Scoring for the intelligent strategy
 */
export const createStrategy = (
  name: StrategyName,
  intelligent?: Partial<IntelligentScoringConfig>
): RoutingStrategy => {
  switch (name) {
    case "priority":
      return createPriorityStrategy();
    case "intelligent":
      return createIntelligentStrategy(intelligent);
    case "round_robin":
      return createRoundRobinStrategy();
    case "fastest":
      return createFastestStrategy();
    case "least_used":
      return createLeastUsedStrategy();
  }
};

/**
 * Available strategy names
 */
export const AVAILABLE_STRATEGIES: readonly StrategyName[] = STRATEGY_NAMES;
