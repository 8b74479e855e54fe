import type { RoutingStrategy, RankProvidersFn } from "../types/strategy.js";
import type { ProviderCandidate } from "../types/provider.js";
import { getSuccessRate } from "../types/provider.js";
import type { IntelligentScoringConfig } from "../types/config.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { byPriority, filterUntried, selectFirstRanked } from "./ranking.js";

/**
 * Speed score between 0 and 1 (1 = fastest)
 *
 * - "fastest": the fastest eligible provider scores 1, one twice as slow 0.5
 * - "fixed": 1 at 0ms, falling linearly to 0 at the reference latency
 */
export const calculateSpeedScore = (
  averageMs: number | null,
  fastestMs: number | null,
  config: IntelligentScoringConfig
): number => {
  if (averageMs === null) {
    return config.neutralScore;
  }
  if (config.latencyNormalization === "fixed") {
    return 1 - Math.min(averageMs / config.referenceLatencyMs, 1);
  }
  if (fastestMs === null || averageMs <= 0) {
    return 1;
  }
  return Math.min(fastestMs / averageMs, 1);
};

/**
 * Weighted score of success rate and speed
 *
 * ```
 * score = successWeight × successRate + speedWeight × speedScore
 * ```
 *
 * A provider with no history scores `neutralScore` on that component, so
 * new providers are neither favoured nor starved.
 */
export const calculateScore = (
  candidate: ProviderCandidate,
  fastestMs: number | null,
  config: IntelligentScoringConfig
): number => {
  const successRate = getSuccessRate(candidate.state) ?? config.neutralScore;
  const speed = calculateSpeedScore(candidate.state.averageResponseMs, fastestMs, config);
  return config.successWeight * successRate + config.speedWeight * speed;
};

const findFastest = (candidates: readonly ProviderCandidate[]): number | null => {
  const samples = candidates
    .map((c) => c.state.averageResponseMs)
    .filter((ms): ms is number => ms !== null);
  return samples.length > 0 ? Math.min(...samples) : null;
};

/**
 * Intelligent routing strategy
 *
 * Prefers providers that succeed often and answer quickly. Highest score
 * wins; equal scores fall back to priority order.
 */
export const createIntelligentStrategy = (
  config: Partial<IntelligentScoringConfig> = {}
): RoutingStrategy => {
  const scoring: IntelligentScoringConfig = { ...DEFAULT_CONFIG.intelligent, ...config };

  const rank: RankProvidersFn = (candidates, context) => {
    const fastestMs = findFastest(candidates);
    return filterUntried(candidates, context)
      .map((candidate) => ({
        candidate,
        score: calculateScore(candidate, fastestMs, scoring),
      }))
      .sort((a, b) => b.score - a.score || byPriority(a.candidate, b.candidate))
      .map(({ candidate }) => candidate);
  };

  return {
    name: "intelligent",
    rank,
    select: selectFirstRanked(rank),
  };
};
