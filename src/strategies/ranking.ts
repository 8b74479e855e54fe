import type {
  RankProvidersFn,
  RoutingContext,
  SelectProviderFn,
} from "../types/strategy.js";
import type { ProviderCandidate } from "../types/provider.js";
import { ok, err } from "neverthrow";

/**
 * Candidates not yet tried in this call
 */
export const filterUntried = (
  candidates: readonly ProviderCandidate[],
  context: RoutingContext
): ProviderCandidate[] =>
  candidates.filter((c) => !context.excludedProviders.has(c.config.id));

/**
 * Ascending priority. Array sort is stable, so registry order breaks ties.
 */
export const byPriority = (a: ProviderCandidate, b: ProviderCandidate): number =>
  a.config.priority - b.config.priority;

export const sortByPriority = (
  candidates: readonly ProviderCandidate[]
): ProviderCandidate[] => [...candidates].sort(byPriority);

/**
 * Build a select function that takes the head of a ranking
 */
export const selectFirstRanked =
  (rank: RankProvidersFn): SelectProviderFn =>
  (candidates, context) => {
    if (candidates.length === 0) {
      return err("no_candidates");
    }
    const [first] = rank(candidates, context);
    return first ? ok(first) : err("all_providers_excluded");
  };
