import type { ResolvedProviderConfig } from "../types/config.js";
import type { ProviderCandidate, ProviderState } from "../types/provider.js";
import { evaluateStatus, getAvailableAfter, getSuccessRate } from "../types/provider.js";
import type { ProviderHealth } from "../types/stats.js";
import type { CircuitBreaker } from "../circuit-breaker/breaker.js";
import type { RateLimiter } from "../rate-limit/limiter.js";
import {
  calculateUpdatedLatency,
  createInitialState,
  DEFAULT_LATENCY_CONFIG,
  type LatencyConfig,
} from "./utils.js";

/**
 * Provider registry
 *
 * Holds the resolved configuration and the runtime state of every
 * provider for the lifetime of a router. Every method is synchronous:
 * two concurrent requests can never interleave inside one update, so
 * no count or timestamp is lost.
 */
export interface ProviderRegistry {
  /** Configured providers in registry order, disabled ones included */
  list(): readonly ResolvedProviderConfig[];
  /** Provider with a snapshot of its state */
  get(id: string): ProviderCandidate | undefined;
  /** Number of providers that can ever be selected */
  enabledCount(): number;
  /** Enabled providers that are active at `now`, in registry order */
  candidates(now: number): ProviderCandidate[];
  /** Successful call: reset the breaker and fold the latency in */
  recordSuccess(id: string, latencyMs: number, now: number): void;
  /**
   * Failed call: count it towards the breaker
   *
   * @returns true when this failure opened the circuit
   */
  recordFailure(id: string, message: string, now: number): boolean;
  /**
   * Rate-limited call: start a cooldown
   *
   * @returns When the rate-limit cooldown ends
   */
  recordRateLimit(id: string, message: string, now: number, retryAfterMs?: number): number;
  /** Health view of every provider at `now` */
  health(now: number): ProviderHealth[];
  /**
   * Zero the cumulative counters and latency history
   *
   * Circuit and cooldown state is kept.
   */
  resetCounters(): void;
  /** Current round-robin cursor; advances it by one */
  nextRoundRobinOffset(): number;
}

export interface ProviderRegistryConfig {
  providers: readonly ResolvedProviderConfig[];
  circuitBreaker: CircuitBreaker;
  rateLimiter: RateLimiter;
  latency?: Partial<LatencyConfig>;
}

interface RegistryEntry {
  config: ResolvedProviderConfig;
  state: ProviderState;
}

const snapshot = (entry: RegistryEntry): ProviderCandidate => ({
  config: entry.config,
  state: { ...entry.state },
});

/**
 * Create a provider registry
 */
export const createProviderRegistry = (
  config: ProviderRegistryConfig
): ProviderRegistry => {
  const { circuitBreaker, rateLimiter } = config;
  const latencyConfig: LatencyConfig = { ...DEFAULT_LATENCY_CONFIG, ...config.latency };

  const entries = new Map<string, RegistryEntry>(
    config.providers.map((provider) => [
      provider.id,
      { config: provider, state: createInitialState(provider.enabled) },
    ])
  );
  let roundRobinCursor = 0;

  const requireEntry = (id: string): RegistryEntry => {
    const entry = entries.get(id);
    if (!entry) {
      throw new Error(`Unknown provider: ${id}`);
    }
    return entry;
  };

  return {
    list: () => config.providers,

    get: (id) => {
      const entry = entries.get(id);
      return entry ? snapshot(entry) : undefined;
    },

    enabledCount: () => config.providers.filter((p) => p.enabled).length,

    candidates: (now) =>
      [...entries.values()]
        .filter(
          (entry) => entry.config.enabled && evaluateStatus(entry.state, now) === "active"
        )
        .map(snapshot),

    recordSuccess: (id, latencyMs, now) => {
      const { state } = requireEntry(id);
      const latency = calculateUpdatedLatency(
        state.averageResponseMs,
        state.latencySamples,
        latencyMs,
        latencyConfig
      );
      state.successCount += 1;
      state.averageResponseMs = latency.averageMs;
      state.latencySamples = latency.sampleCount;
      state.lastUsedAt = now;
      circuitBreaker.recordSuccess(state);
    },

    recordFailure: (id, message, now) => {
      const { state } = requireEntry(id);
      state.failureCount += 1;
      state.lastUsedAt = now;
      state.lastError = message;
      return circuitBreaker.recordFailure(state, now);
    },

    recordRateLimit: (id, message, now, retryAfterMs) => {
      const { state } = requireEntry(id);
      state.failureCount += 1;
      state.lastUsedAt = now;
      state.lastError = message;
      return rateLimiter.recordRateLimit(state, now, retryAfterMs);
    },

    health: (now) =>
      [...entries.values()].map(({ config: provider, state }) => {
        const status = evaluateStatus(state, now);
        return {
          id: provider.id,
          name: provider.name,
          adapter: provider.adapter,
          model: provider.model,
          priority: provider.priority,
          status,
          available: status === "active",
          disabledReason: provider.disabledReason,
          successCount: state.successCount,
          failureCount: state.failureCount,
          successRate: getSuccessRate(state),
          averageResponseMs: state.averageResponseMs,
          latencySamples: state.latencySamples,
          consecutiveFailures: state.consecutiveFailures,
          lastUsedAt: state.lastUsedAt,
          availableAfter: getAvailableAfter(state, now),
          lastError: state.lastError,
        };
      }),

    resetCounters: () => {
      for (const { state } of entries.values()) {
        state.successCount = 0;
        state.failureCount = 0;
        state.averageResponseMs = null;
        state.latencySamples = 0;
      }
    },

    nextRoundRobinOffset: () => {
      const offset = roundRobinCursor;
      roundRobinCursor += 1;
      return offset;
    },
  };
};
