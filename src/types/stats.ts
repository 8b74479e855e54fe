import type { AdapterKind, ProviderStatus } from "./provider.js";

/**
 * Per-provider counters kept by the stats collector
 */
export interface ProviderStatsRollup {
  providerId: string;
  attempts: number;
  successes: number;
  failures: number;
  rateLimited: number;
  timeouts: number;
  /** null before the first attempt */
  successRate: number | null;
  /** Mean of successful attempts, null before the first success */
  averageResponseMs: number | null;
}

/**
 * Router-wide statistics since creation or the last reset
 */
export interface AggregateStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cancelledRequests: number;
  totalAttempts: number;
  /** Attempts made after the first one of their request */
  totalFallbacks: number;
  /** successfulRequests / finished requests, null before any finished */
  successRate: number | null;
  /** Mean response time of successful attempts */
  averageResponseMs: number | null;
  providers: Record<string, ProviderStatsRollup>;
  /** Epoch milliseconds */
  startedAt: number;
  lastResetAt: number | null;
}

/**
 * Health view of one provider, read from the registry
 */
export interface ProviderHealth {
  id: string;
  name: string;
  adapter: AdapterKind;
  model: string;
  priority: number;
  /** Effective status at the time of the call */
  status: ProviderStatus;
  /** Whether the provider can be selected right now */
  available: boolean;
  disabledReason: string | null;
  successCount: number;
  failureCount: number;
  successRate: number | null;
  averageResponseMs: number | null;
  /** Successful calls folded into the average (capped) */
  latencySamples: number;
  consecutiveFailures: number;
  lastUsedAt: number | null;
  /** End of the longest running cooldown, null when none is running */
  availableAfter: number | null;
  lastError: string | null;
}
