import type { AttemptRecord } from "../types/generation.js";
import type { AggregateStats, ProviderStatsRollup } from "../types/stats.js";

/**
 * How a whole request ended
 */
export type RequestOutcome = "success" | "failure" | "cancelled";

/**
 * Router-wide request and attempt statistics
 *
 * Counts only; provider health (circuit, cooldowns) lives in the
 * registry, and a reset here never touches it.
 */
export interface StatsCollector {
  recordRequestStarted(): void;
  /**
   * @param index - Zero-based position of the attempt within its request
   */
  recordAttempt(record: AttemptRecord, index: number): void;
  recordRequestFinished(outcome: RequestOutcome): void;
  snapshot(): AggregateStats;
  reset(): void;
}

export interface StatsCollectorConfig {
  /** Providers listed in every snapshot, even before their first attempt */
  providerIds?: readonly string[];
  now?: () => number;
}

interface ProviderCounters {
  attempts: number;
  successes: number;
  failures: number;
  rateLimited: number;
  timeouts: number;
  successLatencyTotalMs: number;
}

interface Counters {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cancelledRequests: number;
  totalAttempts: number;
  totalFallbacks: number;
  successLatencyTotalMs: number;
  successfulAttempts: number;
  providers: Map<string, ProviderCounters>;
}

const emptyProviderCounters = (): ProviderCounters => ({
  attempts: 0,
  successes: 0,
  failures: 0,
  rateLimited: 0,
  timeouts: 0,
  successLatencyTotalMs: 0,
});

const ratio = (part: number, whole: number): number | null =>
  whole === 0 ? null : part / whole;

const toRollup = (providerId: string, c: ProviderCounters): ProviderStatsRollup => ({
  providerId,
  attempts: c.attempts,
  successes: c.successes,
  failures: c.failures,
  rateLimited: c.rateLimited,
  timeouts: c.timeouts,
  successRate: ratio(c.successes, c.attempts),
  averageResponseMs: ratio(c.successLatencyTotalMs, c.successes),
});

/**
 * Create a stats collector
 */
export const createStatsCollector = (
  config: StatsCollectorConfig = {}
): StatsCollector => {
  const now = config.now ?? Date.now;
  const providerIds = config.providerIds ?? [];
  const startedAt = now();
  let lastResetAt: number | null = null;

  const createCounters = (): Counters => ({
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    cancelledRequests: 0,
    totalAttempts: 0,
    totalFallbacks: 0,
    successLatencyTotalMs: 0,
    successfulAttempts: 0,
    providers: new Map(providerIds.map((id) => [id, emptyProviderCounters()])),
  });

  let counters = createCounters();

  const providerCounters = (id: string): ProviderCounters => {
    const existing = counters.providers.get(id);
    if (existing) return existing;
    const created = emptyProviderCounters();
    counters.providers.set(id, created);
    return created;
  };

  return {
    recordRequestStarted: () => {
      counters.totalRequests += 1;
    },

    recordAttempt: (record, index) => {
      const provider = providerCounters(record.providerId);
      counters.totalAttempts += 1;
      provider.attempts += 1;
      if (index > 0) {
        counters.totalFallbacks += 1;
      }

      switch (record.outcome) {
        case "success":
          provider.successes += 1;
          provider.successLatencyTotalMs += record.responseTimeMs;
          counters.successfulAttempts += 1;
          counters.successLatencyTotalMs += record.responseTimeMs;
          break;
        case "rate_limited":
          provider.failures += 1;
          provider.rateLimited += 1;
          break;
        case "timeout":
          provider.failures += 1;
          provider.timeouts += 1;
          break;
        case "cancelled":
          break;
        default:
          provider.failures += 1;
      }
    },

    recordRequestFinished: (outcome) => {
      if (outcome === "success") counters.successfulRequests += 1;
      else if (outcome === "failure") counters.failedRequests += 1;
      else counters.cancelledRequests += 1;
    },

    snapshot: () => {
      const finished =
        counters.successfulRequests + counters.failedRequests + counters.cancelledRequests;
      const providers: Record<string, ProviderStatsRollup> = {};
      for (const [id, c] of counters.providers) {
        providers[id] = toRollup(id, c);
      }
      return {
        totalRequests: counters.totalRequests,
        successfulRequests: counters.successfulRequests,
        failedRequests: counters.failedRequests,
        cancelledRequests: counters.cancelledRequests,
        totalAttempts: counters.totalAttempts,
        totalFallbacks: counters.totalFallbacks,
        successRate: ratio(counters.successfulRequests, finished),
        averageResponseMs: ratio(counters.successLatencyTotalMs, counters.successfulAttempts),
        providers,
        startedAt,
        lastResetAt,
      };
    },

    reset: () => {
      counters = createCounters();
      lastResetAt = now();
    },
  };
};
