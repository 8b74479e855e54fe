/**
 * Main Router Module
 *
 * Routes text-generation requests across interchangeable providers. The
 * router itself is thin: it wires the registry, circuit breaker, rate
 * limiter, strategies, adapters and stats together and hands each request
 * to the fallback executor.
 */

import type { ProviderAdapter } from "./types/provider.js";
import type { RoutingStrategy, StrategyName } from "./types/strategy.js";
import { isStrategyName } from "./types/strategy.js";
import type { GenerateRequest, GenerationResult } from "./types/generation.js";
import type { AggregateStats, ProviderHealth } from "./types/stats.js";
import {
  type ResolvedProviderConfig,
  type RouterConfig,
  resolveConfig,
} from "./types/config.js";
import { ConfigurationError } from "./types/errors.js";
import { createCircuitBreaker } from "./circuit-breaker/breaker.js";
import { createRateLimiter } from "./rate-limit/limiter.js";
import { createProviderRegistry } from "./state/registry.js";
import { createStatsCollector } from "./stats/collector.js";
import { createStrategy } from "./strategies/index.js";
import { createAdapter } from "./providers/index.js";
import { executeWithFallback } from "./routing/executor.js";
import {
  loadProviderRegistry,
  providersFromRegistry,
  type Environment,
} from "./config/loader.js";
import { resolveLogger } from "./utils/debug.js";

/**
 * Provider entry as listed by the router
 */
export type ProviderInfo = Omit<ResolvedProviderConfig, "apiKey" | "headers"> & {
  /** Whether a credential is configured; the key itself is never exposed */
  hasCredential: boolean;
};

/**
 * Router instance interface
 */
export interface Router {
  /**
   * Generate text, falling back across providers until one succeeds
   *
   * Never rejects for provider failures: the result carries `success`,
   * the failure reason and every attempt made.
   */
  generate(request: GenerateRequest): Promise<GenerationResult>;

  /**
   * Aggregate statistics since creation or the last reset
   */
  getStats(): AggregateStats;

  /**
   * Current health of every configured provider, disabled ones included
   */
  getProviderHealth(): ProviderHealth[];

  /**
   * Zero statistics and provider counters
   *
   * Open circuits and rate-limit cooldowns stay in force.
   */
  resetStats(): void;

  /**
   * Configured providers in registry order
   */
  listProviders(): ProviderInfo[];
}

const toProviderInfo = ({
  apiKey,
  headers: _headers,
  ...rest
}: ResolvedProviderConfig): ProviderInfo => ({
  ...rest,
  hasCredential: apiKey !== null,
});

/**
 * Create a router instance
 *
 * Every router owns its own registry and stats; two routers never share
 * state.
 *
 * @param config - Router configuration
 * @returns Router instance
 * @throws ConfigurationError when no provider can ever be used
 *
 * @example
 * ```typescript
 * const router = createRouter({
 *   providers: [
 *     {
 *       id: "groq",
 *       adapter: "openai-compatible",
 *       baseUrl: "https://api.groq.com/openai/v1",
 *       apiKey: process.env.GROQ_API_KEY,
 *       model: "llama-3.3-70b-versatile",
 *       priority: 1,
 *     },
 *     {
 *       id: "claude",
 *       adapter: "anthropic",
 *       apiKey: process.env.ANTHROPIC_API_KEY,
 *       model: "claude-3-5-sonnet-20241022",
 *       priority: 2,
 *     },
 *   ],
 *   strategy: "priority",
 * });
 *
 * const result = await router.generate({ prompt: "Hello!" });
 * if (result.success) {
 *   console.log(result.providerId, result.content);
 * }
 * ```
 */
export const createRouter = (config: RouterConfig): Router => {
  const resolved = resolveConfig(config);
  const logger = resolveLogger(config);
  const now = config.now ?? Date.now;

  const registry = createProviderRegistry({
    providers: resolved.providers,
    circuitBreaker: createCircuitBreaker(resolved.circuitBreaker),
    rateLimiter: createRateLimiter(resolved.rateLimit),
    latency: { decay: resolved.latencyDecay },
  });

  const stats = createStatsCollector({
    providerIds: resolved.providers.map((p) => p.id),
    now,
  });

  const adapterFactory = config.adapterFactory ?? createAdapter;
  const adapters = new Map<string, ProviderAdapter>();
  for (const provider of resolved.providers) {
    if (!provider.enabled) {
      logger.log(`Provider ${provider.id} disabled (${provider.disabledReason})`);
      continue;
    }
    adapters.set(provider.id, adapterFactory(provider));
    logger.log(
      `Provider ${provider.id} ready (${provider.adapter}, ${provider.model}, priority ${provider.priority})`
    );
  }

  const strategies = new Map<StrategyName, RoutingStrategy>();
  const getStrategy = (name: StrategyName): RoutingStrategy => {
    const cached = strategies.get(name);
    if (cached) return cached;
    const strategy = createStrategy(name, resolved.intelligent);
    strategies.set(name, strategy);
    return strategy;
  };

  const generate = async (request: GenerateRequest): Promise<GenerationResult> => {
    const strategyName = request.strategy ?? resolved.strategy;
    if (!isStrategyName(strategyName)) {
      throw new ConfigurationError(`Unknown routing strategy: ${String(strategyName)}`);
    }
    if (
      request.maxAttempts !== undefined &&
      (!Number.isInteger(request.maxAttempts) || request.maxAttempts < 1)
    ) {
      throw new ConfigurationError(
        `maxAttempts must be a positive integer, got ${request.maxAttempts}`
      );
    }

    return executeWithFallback(request, {
      registry,
      adapters,
      strategy: getStrategy(strategyName),
      maxAttempts: resolved.maxAttempts,
      stats,
      logger,
      now,
    });
  };

  return {
    generate,
    getStats: () => stats.snapshot(),
    getProviderHealth: () => registry.health(now()),
    resetStats: () => {
      stats.reset();
      registry.resetCounters();
      logger.log("Statistics reset");
    },
    listProviders: () => registry.list().map(toProviderInfo),
  };
};

/**
 * Options for building a router from the YAML registry
 */
export type RouterFromEnvOptions = Omit<RouterConfig, "providers"> & {
  /** Registry file. Default: config/providers.yml */
  registryPath?: string;
  /** Where credentials are read from. Default: process.env */
  env?: Environment;
};

/**
 * Create a router from the provider registry and environment credentials
 *
 * Providers whose key variable is unset are listed as disabled.
 *
 * @throws ConfigValidationError when the registry file is malformed
 * @throws ConfigurationError when no provider has a credential
 */
export const createRouterFromEnv = (options: RouterFromEnvOptions = {}): Router => {
  const { registryPath, env, ...config } = options;
  const registry = loadProviderRegistry(registryPath);
  return createRouter({
    ...config,
    providers: providersFromRegistry(registry, env ?? process.env),
  });
};
