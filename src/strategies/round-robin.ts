import type { RoutingStrategy, RankProvidersFn } from "../types/strategy.js";
import { filterUntried, selectFirstRanked, sortByPriority } from "./ranking.js";

/**
 * Rotate the eligible list by the request's cursor, then drop tried providers
 *
 * The rotation is applied to the whole eligible set so that the starting
 * point of a request does not move while it falls back.
 */
const rankByRotation: RankProvidersFn = (candidates, context) => {
  const ordered = sortByPriority(candidates);
  if (ordered.length === 0) {
    return [];
  }
  const start = context.roundRobinOffset % ordered.length;
  const rotated = [...ordered.slice(start), ...ordered.slice(0, start)];
  return filterUntried(rotated, context);
};

/**
 * Round-robin routing strategy
 *
 * Spreads requests evenly over the eligible providers. The router
 * advances the cursor once per request.
 */
export const createRoundRobinStrategy = (): RoutingStrategy => ({
  name: "round_robin",
  rank: rankByRotation,
  select: selectFirstRanked(rankByRotation),
});
