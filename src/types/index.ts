// Provider types
export {
  type AdapterKind,
  type ChatRole,
  type ChatMessage,
  type CompletionRequest,
  type CompletionResponse,
  type ProviderAdapter,
  type ProviderStatus,
  type ProviderState,
  type ProviderCandidate,
  ADAPTER_KINDS,
  isAdapterKind,
  evaluateStatus,
  getAvailableAfter,
  getSuccessRate,
} from "./provider.js";

// Configuration types
export {
  type ProviderConfig,
  type CircuitBreakerConfig,
  type RateLimitConfig,
  type LatencyNormalization,
  type IntelligentScoringConfig,
  type AdapterFactory,
  type RouterConfig,
  type DisabledReason,
  type ResolvedConfig,
  type ResolvedProviderConfig,
  DEFAULT_BASE_URLS,
  DEFAULT_CONFIG,
  resolveConfig,
} from "./config.js";

// Request and result types
export type {
  GenerateRequest,
  AttemptOutcome,
  AttemptRecord,
  FailureReason,
  GenerationSuccess,
  GenerationFailure,
  GenerationResult,
} from "./generation.js";

// Stats and health types
export type {
  ProviderStatsRollup,
  AggregateStats,
  ProviderHealth,
} from "./stats.js";

// Error types
export {
  RouterError,
  AuthenticationError,
  RateLimitError,
  TimeoutError,
  TransportError,
  ProviderError,
  AllProvidersExhaustedError,
  ConfigurationError,
  ConfigValidationError,
  type ExhaustedAttempt,
} from "./errors.js";

// Strategy types
export {
  type RoutingContext,
  type RoutingStrategy,
  type RankProvidersFn,
  type SelectProviderFn,
  type SelectionError,
  type StrategyName,
  STRATEGY_NAMES,
  isStrategyName,
} from "./strategy.js";

// Re-export Result type from neverthrow for convenience
export { type Result, ok, err } from "neverthrow";
