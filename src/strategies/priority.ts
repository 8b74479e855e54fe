import type { RoutingStrategy, RankProvidersFn } from "../types/strategy.js";
import { filterUntried, selectFirstRanked, sortByPriority } from "./ranking.js";

/**
 * Rank untried providers by configured priority
 *
 * Lower number = tried earlier. Providers sharing a priority keep the
 * order they were registered in.
 */
const rankByPriority: RankProvidersFn = (candidates, context) =>
  sortByPriority(filterUntried(candidates, context));

/**
 * Priority Fallback routing strategy
 *
 * Routes requests to providers in configured priority order. Predictable,
 * and the right choice when there is a preferred provider with cheaper
 * ones behind it.
 *
 * @example
 * ```typescript
 * const strategy = createPriorityStrategy();
 * // With priorities: deepseek=1, groq=2, openrouter=3
 * // Will always try deepseek first, then groq, then openrouter
 * ```
 */
export const createPriorityStrategy = (): RoutingStrategy => ({
  name: "priority",
  rank: rankByPriority,
  select: selectFirstRanked(rankByPriority),
});
