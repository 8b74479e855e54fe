import type { ProviderCandidate, ProviderState } from "../types/provider.js";
import type { RoutingContext } from "../types/strategy.js";
import { createInitialState } from "../state/utils.js";

/**
 * Helper to create a candidate for strategy tests
 */
export const createMockCandidate = (
  id: string,
  priority: number,
  state: Partial<ProviderState> = {}
): ProviderCandidate => ({
  config: {
    id,
    name: id,
    adapter: "openai-compatible",
    apiKey: "test-key",
    baseUrl: "https://example.test/v1",
    model: `${id}-model`,
    priority,
    timeoutMs: 30_000,
    maxTokens: 256,
    temperature: 0.7,
    enabled: true,
    disabledReason: null,
    headers: {},
  },
  state: { ...createInitialState(true), ...state },
});

export const createContext = (
  excludedProviders: string[] = [],
  roundRobinOffset = 0
): RoutingContext => ({
  excludedProviders: new Set(excludedProviders),
  attempt: excludedProviders.length,
  roundRobinOffset,
});

export const ids = (candidates: readonly ProviderCandidate[]): string[] =>
  candidates.map((c) => c.config.id);
