/**
 * Provider Selection Module
 *
 * Builds the eligible set from the registry and applies the routing
 * strategy to it. Selection never throws: an empty set is an error value.
 */

import type { ProviderCandidate } from "../types/provider.js";
import type { RoutingContext, SelectionError } from "../types/strategy.js";
import type { GenerateRequest } from "../types/generation.js";
import { ok, err, type Result } from "neverthrow";
import type { ProviderRegistry } from "../state/registry.js";
import type { ProviderScope, SelectionDependencies } from "./types.js";

/**
 * Selection errors with more context
 */
export type ProviderSelectionError =
  | { type: "no_eligible_providers" }
  | { type: "strategy_error"; error: SelectionError };

export const UNRESTRICTED_SCOPE: ProviderScope = { allowed: null, preferred: [] };

/**
 * Scope of a request from its allowed and preferred lists
 *
 * An empty allowed list means no restriction.
 */
export const createProviderScope = (
  request: Pick<GenerateRequest, "allowedProviders" | "preferredProviders">
): ProviderScope => {
  const allowed = request.allowedProviders ?? [];
  return {
    allowed: allowed.length > 0 ? new Set(allowed) : null,
    preferred: request.preferredProviders ?? [],
  };
};

export const isInScope = (scope: ProviderScope, id: string): boolean =>
  scope.allowed === null || scope.allowed.has(id);

/**
 * Eligible providers: enabled, active at `now` and in scope, in registry order
 */
export const buildCandidates = (
  registry: ProviderRegistry,
  now: number,
  scope: ProviderScope = UNRESTRICTED_SCOPE
): ProviderCandidate[] =>
  registry.candidates(now).filter((c) => isInScope(scope, c.config.id));

/**
 * Enabled providers a request may try, whatever their current status
 */
export const countInScope = (registry: ProviderRegistry, scope: ProviderScope): number =>
  scope.allowed === null
    ? registry.enabledCount()
    : registry.list().filter((p) => p.enabled && isInScope(scope, p.id)).length;

/**
 * First preferred provider that is eligible and not yet tried
 */
const findPreferred = (
  candidates: readonly ProviderCandidate[],
  context: RoutingContext,
  preferred: readonly string[]
): ProviderCandidate | undefined => {
  for (const id of preferred) {
    if (context.excludedProviders.has(id)) continue;
    const match = candidates.find((c) => c.config.id === id);
    if (match) return match;
  }
  return undefined;
};

/**
 * Select the next provider for a request
 *
 * Preferred providers go first in their listed order; once they are
 * tried or ineligible, the strategy ranks the rest.
 *
 * @param context - Routing context with exclusions and cursor
 * @param deps - Selection dependencies
 * @returns Result with the selected candidate or why there is none
 */
export const selectProvider = (
  context: RoutingContext,
  deps: SelectionDependencies
): Result<ProviderCandidate, ProviderSelectionError> => {
  const { registry, strategy, now, scope = UNRESTRICTED_SCOPE } = deps;

  const candidates = buildCandidates(registry, now, scope);
  if (candidates.length === 0) {
    return err({ type: "no_eligible_providers" });
  }

  const preferred = findPreferred(candidates, context, scope.preferred);
  if (preferred) {
    return ok(preferred);
  }

  const result = strategy.select(candidates, context);
  return result.isOk()
    ? ok(result.value)
    : err({ type: "strategy_error", error: result.error });
};
