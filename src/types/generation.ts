import type { StrategyName } from "./strategy.js";

/**
 * A single text-generation request
 */
export interface GenerateRequest {
  /** User prompt */
  prompt: string;
  /** Optional system prompt, sent before the user prompt */
  systemPrompt?: string;
  /** Strategy for this request. Default: router strategy */
  strategy?: StrategyName;
  /**
   * Only these provider ids may be tried. Unknown ids are ignored.
   * Default (or empty): every provider
   */
  allowedProviders?: readonly string[];
  /** Provider ids tried first, in this order, before the strategy's order */
  preferredProviders?: readonly string[];
  /** Ceiling on attempts for this request. Default: router maxAttempts */
  maxAttempts?: number;
  /** Max tokens to generate. Default: provider maxTokens */
  maxTokens?: number;
  /** Sampling temperature. Default: provider temperature */
  temperature?: number;
  /** Aborts the request, including the in-flight provider call */
  signal?: AbortSignal;
}

/**
 * How a single provider attempt ended
 */
export type AttemptOutcome =
  | "success"
  | "timeout"
  | "rate_limited"
  | "auth_error"
  | "network_error"
  | "provider_error"
  | "cancelled";

/**
 * One provider attempt within a request
 */
export interface AttemptRecord {
  providerId: string;
  /** Epoch milliseconds */
  startedAt: number;
  outcome: AttemptOutcome;
  responseTimeMs: number;
  error?: string;
}

export type FailureReason =
  | "all_providers_exhausted"
  | "no_eligible_providers"
  | "cancelled";

export interface GenerationSuccess {
  success: true;
  content: string;
  providerId: string;
  providerName: string;
  model: string;
  tokensUsed: number;
  /** Wall time of the whole request */
  responseTimeMs: number;
  attempts: AttemptRecord[];
}

export interface GenerationFailure {
  success: false;
  error: string;
  reason: FailureReason;
  responseTimeMs: number;
  attempts: AttemptRecord[];
}

/**
 * Outcome of `generate()`. Never thrown; failures are values.
 */
export type GenerationResult = GenerationSuccess | GenerationFailure;
