import type { ProviderCandidate } from "./provider.js";
import type { Result } from "neverthrow";

/**
 * Strategy name type
 */
export type StrategyName =
  | "priority"
  | "intelligent"
  | "round_robin"
  | "fastest"
  | "least_used";

export const STRATEGY_NAMES: readonly StrategyName[] = [
  "priority",
  "intelligent",
  "round_robin",
  "fastest",
  "least_used",
];

export const isStrategyName = (value: unknown): value is StrategyName =>
  typeof value === "string" && STRATEGY_NAMES.some((name) => name === value);

/**
 * Context provided to routing strategies
 */
export interface RoutingContext {
  /** Providers already tried in this call */
  readonly excludedProviders: ReadonlySet<string>;
  /** Zero-based attempt index within the call */
  readonly attempt: number;
  /** Round-robin cursor, fixed for the whole call */
  readonly roundRobinOffset: number;
}

/**
 * Errors that can occur during provider selection
 */
export type SelectionError = "no_candidates" | "all_providers_excluded";

/**
 * Type for the strategy selection function
 */
export type SelectProviderFn = (
  candidates: readonly ProviderCandidate[],
  context: RoutingContext
) => Result<ProviderCandidate, SelectionError>;

/**
 * Type for the strategy ranking function
 */
export type RankProvidersFn = (
  candidates: readonly ProviderCandidate[],
  context: RoutingContext
) => ProviderCandidate[];

/**
 * Routing strategy definition
 *
 * Strategies order the eligible providers. `rank` returns the full
 * preference order of the providers not yet tried; `select` returns its
 * head, or an error when nothing is left.
 */
export type RoutingStrategy = Readonly<{
  /** Strategy identifier */
  name: StrategyName;
  /**
   * Order untried candidates from most to least preferred
   *
   * @param candidates - Eligible providers, in registry order
   * @param context - Routing context with exclusions and cursor
   */
  rank: RankProvidersFn;
  /**
   * Select the next provider to try
   *
   * @returns Result with the selected candidate or an error
   */
  select: SelectProviderFn;
}>;
