import type { RoutingStrategy, RankProvidersFn } from "../types/strategy.js";
import type { ProviderCandidate } from "../types/provider.js";
import { byPriority, filterUntried, selectFirstRanked } from "./ranking.js";

const byLatency = (a: ProviderCandidate, b: ProviderCandidate): number => {
  const aMs = a.state.averageResponseMs;
  const bMs = b.state.averageResponseMs;
  if (aMs === null && bMs === null) return byPriority(a, b);
  if (aMs === null) return 1;
  if (bMs === null) return -1;
  return aMs - bMs || byPriority(a, b);
};

const rankByLatency: RankProvidersFn = (candidates, context) =>
  filterUntried(candidates, context).sort(byLatency);

/**
 * Fastest routing strategy
 *
 * Lowest rolling average response time first. Providers with no samples
 * yet go last.
 */
export const createFastestStrategy = (): RoutingStrategy => ({
  name: "fastest",
  rank: rankByLatency,
  select: selectFirstRanked(rankByLatency),
});
