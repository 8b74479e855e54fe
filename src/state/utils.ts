import type { ProviderState } from "../types/provider.js";

/**
 * Configuration for latency averaging
 */
export interface LatencyConfig {
  /** Weight given to previous average (0-1). Default: 0.5 */
  decay: number;
  /** Cap on the reported sample count. Default: 1000 */
  maxSamples: number;
}

export const DEFAULT_LATENCY_CONFIG: LatencyConfig = {
  decay: 0.5,
  maxSamples: 1000,
};

/**
 * Fresh runtime state for a provider
 */
export const createInitialState = (enabled: boolean): ProviderState => ({
  disabled: !enabled,
  consecutiveFailures: 0,
  successCount: 0,
  failureCount: 0,
  averageResponseMs: null,
  latencySamples: 0,
  lastUsedAt: null,
  circuitOpenUntil: null,
  rateLimitedUntil: null,
  lastError: null,
});

/**
 * Calculate an updated latency average using an Exponential Moving Average
 *
 * ```
 * newAverage = (oldAverage × decay) + (newSample × (1 - decay))
 * ```
 *
 * With decay = 0.5 each new sample weighs as much as all history, i.e.
 * `(old + new) / 2`:
 *
 * | Sample | Calculation          | New Average |
 * |--------|----------------------|-------------|
 * | 100ms  | (first sample)       | 100ms       |
 * | 300ms  | (100 + 300) / 2      | 200ms       |
 * | 200ms  | (200 + 200) / 2      | 200ms       |
 * | 600ms  | (200 + 600) / 2      | 400ms       |
 *
 * @param existing - Current average, null before the first sample
 * @param samples - Samples folded into `existing` so far
 * @param latencyMs - New sample in milliseconds
 */
export const calculateUpdatedLatency = (
  existing: number | null,
  samples: number,
  latencyMs: number,
  config: LatencyConfig = DEFAULT_LATENCY_CONFIG
): { averageMs: number; sampleCount: number } => {
  const { decay, maxSamples } = config;

  // First sample - just use the raw value as the starting average
  if (existing === null) {
    return { averageMs: latencyMs, sampleCount: 1 };
  }

  return {
    averageMs: existing * decay + latencyMs * (1 - decay),
    sampleCount: Math.min(samples + 1, maxSamples),
  };
};
