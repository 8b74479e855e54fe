import type { RoutingStrategy, RankProvidersFn } from "../types/strategy.js";
import type { ProviderCandidate } from "../types/provider.js";
import { byPriority, filterUntried, selectFirstRanked } from "./ranking.js";

/**
 * Calls recorded against a provider since creation or the last reset
 */
export const calculateUsage = (candidate: ProviderCandidate): number =>
  candidate.state.successCount + candidate.state.failureCount;

const byUsage = (a: ProviderCandidate, b: ProviderCandidate): number =>
  calculateUsage(a) - calculateUsage(b) || byPriority(a, b);

const rankByUsage: RankProvidersFn = (candidates, context) =>
  filterUntried(candidates, context).sort(byUsage);

/**
 * Least Used routing strategy
 *
 * Routes to the provider with the fewest recorded calls, spreading load
 * across the pool. On a tie, lower priority number wins.
 *
 * @example
 * ```typescript
 * const strategy = createLeastUsedStrategy();
 * // groq: 12 calls, deepseek: 3 calls
 * // → Routes to deepseek
 * ```
 */
export const createLeastUsedStrategy = (): RoutingStrategy => ({
  name: "least_used",
  rank: rankByUsage,
  select: selectFirstRanked(rankByUsage),
});
