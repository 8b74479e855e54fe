import type { ResolvedProviderConfig } from "./config.js";

/**
 * Supported adapter kinds
 *
 * Each kind is one remote API family. Many vendors (DeepSeek, Groq,
 * Cerebras, Mistral, OpenRouter, ...) share the `openai-compatible` kind.
 */
export type AdapterKind =
  | "openai-compatible"
  | "azure-openai"
  | "anthropic"
  | "gemini"
  | "cohere"
  | "huggingface";

export const ADAPTER_KINDS: readonly AdapterKind[] = [
  "openai-compatible",
  "azure-openai",
  "anthropic",
  "gemini",
  "cohere",
  "huggingface",
];

export const isAdapterKind = (value: unknown): value is AdapterKind =>
  typeof value === "string" &&
  ADAPTER_KINDS.some((kind) => kind === value);

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Uniform request handed to every adapter
 */
export interface CompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  /** Aborted on timeout or caller cancellation */
  signal: AbortSignal;
}

/**
 * Uniform response returned by every adapter
 */
export interface CompletionResponse {
  /** Generated text */
  content: string;
  /** Model reported by the provider, when it reports one */
  model?: string;
  /** Total tokens billed for the call (0 when unknown) */
  tokensUsed: number;
}

/**
 * Translation between the uniform contract and one remote API.
 *
 * `send` resolves with the generated text or rejects with one of the
 * router's typed errors (AuthenticationError, RateLimitError,
 * TimeoutError, TransportError, ProviderError).
 */
export interface ProviderAdapter {
  readonly kind: AdapterKind;
  send(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Runtime status of a provider
 */
export type ProviderStatus =
  | "active"
  | "circuit_open"
  | "rate_limited"
  | "disabled";

/**
 * Mutable runtime state, one per provider, owned by the registry
 *
 * The circuit breaker and the rate limiter each keep their own deadline,
 * so neither can end the other's cooldown.
 */
export interface ProviderState {
  /** Never selectable (no credential, or switched off in config) */
  disabled: boolean;
  consecutiveFailures: number;
  successCount: number;
  failureCount: number;
  /** Rolling average response time of successful calls */
  averageResponseMs: number | null;
  /** Successful calls folded into the average */
  latencySamples: number;
  lastUsedAt: number | null;
  /** Set by the circuit breaker; cleared by a success */
  circuitOpenUntil: number | null;
  /** Set by the rate limiter; only time clears it */
  rateLimitedUntil: number | null;
  lastError: string | null;
}

const isRunning = (until: number | null, now: number): until is number =>
  until !== null && now < until;

/**
 * Effective status of a provider at a given time
 *
 * Cooldowns are never swept by a timer: a provider whose deadlines have
 * passed reads as active again. An open circuit is reported ahead of a
 * rate limit running at the same time.
 */
export const evaluateStatus = (
  state: Readonly<ProviderState>,
  now: number
): ProviderStatus => {
  if (state.disabled) {
    return "disabled";
  }
  if (isRunning(state.circuitOpenUntil, now)) {
    return "circuit_open";
  }
  if (isRunning(state.rateLimitedUntil, now)) {
    return "rate_limited";
  }
  return "active";
};

/**
 * When the provider becomes eligible again, or null when it already is
 */
export const getAvailableAfter = (
  state: Readonly<ProviderState>,
  now: number
): number | null => {
  const running = [state.circuitOpenUntil, state.rateLimitedUntil].filter(
    (until): until is number => isRunning(until, now)
  );
  return running.length === 0 ? null : Math.max(...running);
};

/**
 * Success rate between 0 and 1, or null when the provider has no history
 */
export const getSuccessRate = (state: Readonly<ProviderState>): number | null => {
  const total = state.successCount + state.failureCount;
  return total === 0 ? null : state.successCount / Math.max(total, 1);
};

/**
 * Eligible provider with its current runtime state
 * Used by routing strategies to make decisions
 */
export interface ProviderCandidate {
  /** Resolved provider configuration */
  config: ResolvedProviderConfig;
  /** Snapshot of the provider's runtime state */
  state: Readonly<ProviderState>;
}
