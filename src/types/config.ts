import type { AdapterKind, ProviderAdapter } from "./provider.js";
import { isAdapterKind } from "./provider.js";
import type { StrategyName } from "./strategy.js";
import { isStrategyName } from "./strategy.js";
import type { DebugLogger } from "../utils/debug.js";
import { ConfigurationError } from "./errors.js";

/**
 * Configuration for a single provider
 */
export interface ProviderConfig {
  /** Unique provider identifier (e.g., "deepseek") */
  id: string;
  /** Display name for logs and health output. Default: the id */
  name?: string;
  /** Which remote API family the provider speaks */
  adapter: AdapterKind;
  /** API key. A provider without one is kept but never selected */
  apiKey?: string | null;
  /**
   * Base URL. Defaults per adapter kind (required for azure-openai).
   * null when the endpoint is read from a variable that is unset: the
   * provider is kept but never selected
   */
  baseUrl?: string | null;
  /** Model identifier (deployment name for azure-openai) */
  model: string;
  /** Priority for routing (lower = tried earlier). Default: 10 */
  priority?: number;
  /** Per-call timeout in milliseconds. Default: router timeoutMs */
  timeoutMs?: number;
  /** Default max tokens when the request gives none. Default: 4096 */
  maxTokens?: number;
  /** Default temperature when the request gives none. Default: 0.7 */
  temperature?: number;
  /** Whether this provider is enabled. Default: true */
  enabled?: boolean;
  /** Extra HTTP headers sent with every call */
  headers?: Record<string, string>;
  /** API version for vendors that version by header or query */
  apiVersion?: string;
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. Default: 5 */
  failureThreshold: number;
  /** How long an open circuit stays open in milliseconds. Default: 600000 */
  cooldownMs: number;
}

/**
 * Rate limit cooldown configuration
 */
export interface RateLimitConfig {
  /** Cooldown after a rate-limit signal in milliseconds. Default: 300000 */
  cooldownMs: number;
  /** Extend the cooldown when the provider's Retry-After is longer. Default: true */
  honorRetryAfter: boolean;
}

/**
 * How the intelligent strategy turns latency into a 0-1 penalty
 *
 * - "fastest": relative to the fastest eligible provider (1 - fastest / avg)
 * - "fixed": relative to a fixed reference (min(avg / referenceLatencyMs, 1))
 */
export type LatencyNormalization = "fastest" | "fixed";

/**
 * Scoring parameters for the intelligent strategy
 */
export interface IntelligentScoringConfig {
  /** Weight of the success rate. Default: 0.7 */
  successWeight: number;
  /** Weight of the speed score. Default: 0.3 */
  speedWeight: number;
  /** Score used for a component with no history. Default: 0.5 */
  neutralScore: number;
  /** Default: "fastest" */
  latencyNormalization: LatencyNormalization;
  /** Reference latency for "fixed" normalization. Default: 30000 */
  referenceLatencyMs: number;
}

/**
 * Builds the adapter for a provider. Override to plug in custom transports.
 */
export type AdapterFactory = (provider: ResolvedProviderConfig) => ProviderAdapter;

/**
 * Main configuration for the router
 */
export interface RouterConfig {
  /** Provider configurations */
  providers: ProviderConfig[];
  /** Routing strategy used when a request names none. Default: "intelligent" */
  strategy?: StrategyName;
  /** Ceiling on attempts per request. Default: 10 */
  maxAttempts?: number;
  /** Default per-call timeout in milliseconds. Default: 30000 */
  timeoutMs?: number;
  /** Circuit breaker configuration */
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  /** Rate limit cooldown configuration */
  rateLimit?: Partial<RateLimitConfig>;
  /** Intelligent strategy scoring */
  intelligent?: Partial<IntelligentScoringConfig>;
  /**
   * Weight of history in the rolling latency average (0-1). Default: 0.5
   */
  latencyDecay?: number;
  /** Adapter factory. Default: one adapter per kind */
  adapterFactory?: AdapterFactory;
  /** Log routing decisions to the console */
  debug?: boolean;
  /** Custom logger, takes precedence over `debug` */
  logger?: DebugLogger;
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
}

/**
 * Why a provider can never be selected
 */
export type DisabledReason = "missing_credential" | "missing_endpoint" | "disabled_by_config";

/**
 * Provider config with defaults resolved
 */
export interface ResolvedProviderConfig {
  id: string;
  name: string;
  adapter: AdapterKind;
  apiKey: string | null;
  baseUrl: string;
  model: string;
  priority: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  enabled: boolean;
  disabledReason: DisabledReason | null;
  headers: Record<string, string>;
  apiVersion?: string;
}

/**
 * Validated and normalized configuration with defaults applied
 */
export interface ResolvedConfig {
  providers: ResolvedProviderConfig[];
  strategy: StrategyName;
  maxAttempts: number;
  timeoutMs: number;
  circuitBreaker: CircuitBreakerConfig;
  rateLimit: RateLimitConfig;
  intelligent: IntelligentScoringConfig;
  latencyDecay: number;
}

/**
 * Default base URL per adapter kind (null = must be configured)
 */
export const DEFAULT_BASE_URLS: Record<AdapterKind, string | null> = {
  "openai-compatible": "https://api.openai.com/v1",
  "azure-openai": null,
  anthropic: "https://api.anthropic.com/v1",
  gemini: "https://generativelanguage.googleapis.com/v1beta",
  cohere: "https://api.cohere.ai/v1",
  huggingface: "https://api-inference.huggingface.co/models",
};

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  strategy: "intelligent" as const,
  maxAttempts: 10,
  timeoutMs: 30_000,
  priority: 10,
  maxTokens: 4096,
  temperature: 0.7,
  circuitBreaker: {
    failureThreshold: 5,
    cooldownMs: 10 * 60_000,
  },
  rateLimit: {
    cooldownMs: 5 * 60_000,
    honorRetryAfter: true,
  },
  intelligent: {
    successWeight: 0.7,
    speedWeight: 0.3,
    neutralScore: 0.5,
    latencyNormalization: "fastest" as const,
    referenceLatencyMs: 30_000,
  },
  latencyDecay: 0.5,
} as const;

const isPositive = (value: number): boolean =>
  Number.isFinite(value) && value > 0;

const isUnitInterval = (value: number): boolean =>
  Number.isFinite(value) && value >= 0 && value <= 1;

/**
 * Resolve a single provider entry, validating what cannot be defaulted
 */
const resolveProvider = (
  provider: ProviderConfig,
  defaultTimeoutMs: number
): ResolvedProviderConfig => {
  const { id } = provider;

  if (typeof id !== "string" || id.trim() === "") {
    throw new ConfigurationError("Every provider needs a non-empty id");
  }
  if (!isAdapterKind(provider.adapter)) {
    throw new ConfigurationError(
      `Provider "${id}" has unknown adapter "${String(provider.adapter)}"`
    );
  }
  if (typeof provider.model !== "string" || provider.model.trim() === "") {
    throw new ConfigurationError(`Provider "${id}" needs a model`);
  }

  const endpointMissing = provider.baseUrl === null;
  const baseUrl = endpointMissing ? "" : (provider.baseUrl ?? DEFAULT_BASE_URLS[provider.adapter]);
  if (baseUrl === null || (!endpointMissing && baseUrl === "")) {
    throw new ConfigurationError(
      `Provider "${id}" uses adapter "${provider.adapter}" which requires a baseUrl`
    );
  }

  const timeoutMs = provider.timeoutMs ?? defaultTimeoutMs;
  const maxTokens = provider.maxTokens ?? DEFAULT_CONFIG.maxTokens;
  const priority = provider.priority ?? DEFAULT_CONFIG.priority;

  if (!isPositive(timeoutMs)) {
    throw new ConfigurationError(`Provider "${id}" has invalid timeoutMs ${timeoutMs}`);
  }
  if (!isPositive(maxTokens)) {
    throw new ConfigurationError(`Provider "${id}" has invalid maxTokens ${maxTokens}`);
  }
  if (!Number.isFinite(priority)) {
    throw new ConfigurationError(`Provider "${id}" has invalid priority ${priority}`);
  }

  const apiKey =
    typeof provider.apiKey === "string" && provider.apiKey.trim() !== ""
      ? provider.apiKey
      : null;

  const disabledReason: DisabledReason | null =
    provider.enabled === false
      ? "disabled_by_config"
      : apiKey === null
        ? "missing_credential"
        : endpointMissing
          ? "missing_endpoint"
          : null;

  return {
    id,
    name: provider.name ?? id,
    adapter: provider.adapter,
    apiKey,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    model: provider.model,
    priority,
    timeoutMs,
    maxTokens,
    temperature: provider.temperature ?? DEFAULT_CONFIG.temperature,
    enabled: disabledReason === null,
    disabledReason,
    headers: provider.headers ?? {},
    apiVersion: provider.apiVersion,
  };
};

/**
 * Resolve configuration with defaults
 *
 * @throws ConfigurationError when the configuration cannot produce a working router
 */
export function resolveConfig(config: RouterConfig): ResolvedConfig {
  if (config.providers.length === 0) {
    throw new ConfigurationError("At least one provider must be configured");
  }

  const timeoutMs = config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs;
  if (!isPositive(timeoutMs)) {
    throw new ConfigurationError(`Invalid timeoutMs ${timeoutMs}`);
  }

  const providers = config.providers.map((p) => resolveProvider(p, timeoutMs));

  const seen = new Set<string>();
  for (const provider of providers) {
    if (seen.has(provider.id)) {
      throw new ConfigurationError(`Duplicate provider id "${provider.id}"`);
    }
    seen.add(provider.id);
  }

  if (!providers.some((p) => p.enabled)) {
    throw new ConfigurationError(
      `No provider is enabled. Configure an API key for at least one of: ${providers
        .map((p) => p.id)
        .join(", ")}`
    );
  }

  const strategy = config.strategy ?? DEFAULT_CONFIG.strategy;
  if (!isStrategyName(strategy)) {
    throw new ConfigurationError(`Unknown routing strategy: ${String(strategy)}`);
  }

  const maxAttempts = config.maxAttempts ?? DEFAULT_CONFIG.maxAttempts;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  const circuitBreaker: CircuitBreakerConfig = {
    ...DEFAULT_CONFIG.circuitBreaker,
    ...config.circuitBreaker,
  };
  if (
    !Number.isInteger(circuitBreaker.failureThreshold) ||
    circuitBreaker.failureThreshold < 1
  ) {
    throw new ConfigurationError(
      `circuitBreaker.failureThreshold must be a positive integer, got ${circuitBreaker.failureThreshold}`
    );
  }
  if (!isPositive(circuitBreaker.cooldownMs)) {
    throw new ConfigurationError(
      `circuitBreaker.cooldownMs must be positive, got ${circuitBreaker.cooldownMs}`
    );
  }

  const rateLimit: RateLimitConfig = {
    ...DEFAULT_CONFIG.rateLimit,
    ...config.rateLimit,
  };
  if (!isPositive(rateLimit.cooldownMs)) {
    throw new ConfigurationError(
      `rateLimit.cooldownMs must be positive, got ${rateLimit.cooldownMs}`
    );
  }

  const intelligent: IntelligentScoringConfig = {
    ...DEFAULT_CONFIG.intelligent,
    ...config.intelligent,
  };
  if (
    !isUnitInterval(intelligent.successWeight) ||
    !isUnitInterval(intelligent.speedWeight) ||
    !isUnitInterval(intelligent.neutralScore)
  ) {
    throw new ConfigurationError(
      "intelligent weights and neutralScore must be between 0 and 1"
    );
  }
  if (!isPositive(intelligent.referenceLatencyMs)) {
    throw new ConfigurationError(
      `intelligent.referenceLatencyMs must be positive, got ${intelligent.referenceLatencyMs}`
    );
  }

  const latencyDecay = config.latencyDecay ?? DEFAULT_CONFIG.latencyDecay;
  if (!isUnitInterval(latencyDecay)) {
    throw new ConfigurationError(`latencyDecay must be between 0 and 1, got ${latencyDecay}`);
  }

  return {
    providers,
    strategy,
    maxAttempts,
    timeoutMs,
    circuitBreaker,
    rateLimit,
    intelligent,
    latencyDecay,
  };
}
