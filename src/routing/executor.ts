/**
 * Request Execution Module
 *
 * The fallback loop: pick a provider, call it under a timeout, record the
 * outcome, and move on to the next provider until one succeeds, the
 * attempt budget runs out, or no eligible provider is left.
 */

import { ok, err, type Result } from "neverthrow";
import type {
  CompletionResponse,
  ProviderAdapter,
} from "../types/provider.js";
import type { ResolvedProviderConfig } from "../types/config.js";
import type {
  AttemptOutcome,
  AttemptRecord,
  GenerateRequest,
  GenerationFailure,
  GenerationResult,
} from "../types/generation.js";
import type { ChatMessage } from "../types/provider.js";
import type { RoutingContext } from "../types/strategy.js";
import { AllProvidersExhaustedError } from "../types/errors.js";
import { buildMessages } from "../utils/messages.js";
import {
  countInScope,
  createProviderScope,
  selectProvider,
} from "./provider-selection.js";
import { classifyError } from "./errors.js";
import type { ExecutionDependencies } from "./types.js";

/**
 * Why a single provider call failed
 */
export interface AttemptFailure {
  outcome: Exclude<AttemptOutcome, "success">;
  message: string;
  retryAfterMs?: number;
}

const CANCELLED_MESSAGE = "Request cancelled by caller";

/**
 * Call one provider under its timeout and the caller's signal
 *
 * Both are folded into one AbortController handed to the adapter. The
 * adapter's promise is also raced against the abort, so an adapter that
 * ignores its signal still cannot hold the loop past the timeout.
 */
export const callProvider = async (
  adapter: ProviderAdapter,
  provider: ResolvedProviderConfig,
  request: { messages: ChatMessage[]; maxTokens: number; temperature: number },
  signal?: AbortSignal
): Promise<Result<CompletionResponse, AttemptFailure>> => {
  const controller = new AbortController();
  let timedOut = false;
  let cancelled = false;
  let rejectOnAbort: (reason: Error) => void = () => {};
  const aborted = new Promise<never>((_, reject) => {
    rejectOnAbort = reject;
  });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
    rejectOnAbort(new Error(`Timed out after ${provider.timeoutMs}ms`));
  }, provider.timeoutMs);

  const onCallerAbort = (): void => {
    cancelled = true;
    controller.abort();
    rejectOnAbort(new Error(CANCELLED_MESSAGE));
  };
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const response = await Promise.race([
      adapter.send({ ...request, signal: controller.signal }),
      aborted,
    ]);
    return ok(response);
  } catch (error) {
    // The flags are set before abort(), so they win over whatever the
    // adapter rejected with in reaction to the abort
    if (cancelled) {
      return err({ outcome: "cancelled", message: CANCELLED_MESSAGE });
    }
    if (timedOut) {
      return err({
        outcome: "timeout",
        message: `Request to ${provider.id} timed out after ${provider.timeoutMs}ms`,
      });
    }
    return err(classifyError(error));
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onCallerAbort);
  }
};

/**
 * Number of attempts a request may make
 */
export const computeAttemptBudget = (
  requested: number | undefined,
  ceiling: number,
  enabledCount: number
): number => Math.max(1, Math.min(requested ?? ceiling, enabledCount));

/**
 * Execute a request with provider fallback
 *
 * 1. Select a provider with the request's strategy (re-run every attempt)
 * 2. Call it under its timeout
 * 3. Record the outcome in the registry (breaker, cooldown, latency) and stats
 * 4. Return on success or cancellation, otherwise try the next provider
 *
 * Never throws for provider failures; they come back as a failed result.
 *
 * @param request - The generation request
 * @param deps - Execution dependencies
 */
export const executeWithFallback = async (
  request: GenerateRequest,
  deps: ExecutionDependencies
): Promise<GenerationResult> => {
  const { registry, adapters, strategy, stats, logger, now } = deps;
  const requestStartedAt = now();
  const attempts: AttemptRecord[] = [];
  const excludedProviders = new Set<string>();

  stats.recordRequestStarted();

  const fail = (
    reason: GenerationFailure["reason"],
    error: string
  ): GenerationFailure => {
    stats.recordRequestFinished(reason === "cancelled" ? "cancelled" : "failure");
    return {
      success: false,
      error,
      reason,
      responseTimeMs: now() - requestStartedAt,
      attempts,
    };
  };

  if (request.signal?.aborted) {
    return fail("cancelled", CANCELLED_MESSAGE);
  }

  const messages = buildMessages(request.prompt, request.systemPrompt);
  const scope = createProviderScope(request);
  const budget = computeAttemptBudget(
    request.maxAttempts,
    deps.maxAttempts,
    countInScope(registry, scope)
  );
  const roundRobinOffset =
    strategy.name === "round_robin" ? registry.nextRoundRobinOffset() : 0;

  for (let attempt = 0; attempt < budget; attempt++) {
    const context: RoutingContext = { excludedProviders, attempt, roundRobinOffset };

    const selection = selectProvider(context, { registry, strategy, now: now(), scope });
    if (selection.isErr()) {
      logger.log(`No provider left to try (${selection.error.type})`);
      break;
    }

    const provider = selection.value.config;
    excludedProviders.add(provider.id);
    logger.log(`Attempt ${attempt + 1}/${budget}: ${provider.id} (${strategy.name})`);

    const startedAt = now();
    const adapter = adapters.get(provider.id);
    const result = adapter
      ? await callProvider(
          adapter,
          provider,
          {
            messages,
            maxTokens: request.maxTokens ?? provider.maxTokens,
            temperature: request.temperature ?? provider.temperature,
          },
          request.signal
        )
      : err<CompletionResponse, AttemptFailure>({
          outcome: "provider_error",
          message: `No adapter for provider ${provider.id}`,
        });
    const finishedAt = now();
    const responseTimeMs = finishedAt - startedAt;

    if (result.isOk()) {
      const record: AttemptRecord = {
        providerId: provider.id,
        startedAt,
        outcome: "success",
        responseTimeMs,
      };
      attempts.push(record);
      registry.recordSuccess(provider.id, responseTimeMs, finishedAt);
      stats.recordAttempt(record, attempt);
      stats.recordRequestFinished("success");
      logger.log(`${provider.id} succeeded in ${responseTimeMs}ms`);

      return {
        success: true,
        content: result.value.content,
        providerId: provider.id,
        providerName: provider.name,
        model: result.value.model ?? provider.model,
        tokensUsed: result.value.tokensUsed,
        responseTimeMs: now() - requestStartedAt,
        attempts,
      };
    }

    const failure = result.error;
    const record: AttemptRecord = {
      providerId: provider.id,
      startedAt,
      outcome: failure.outcome,
      responseTimeMs,
      error: failure.message,
    };
    attempts.push(record);

    if (failure.outcome === "cancelled") {
      logger.log(`Request cancelled during attempt on ${provider.id}`);
      return fail("cancelled", CANCELLED_MESSAGE);
    }

    stats.recordAttempt(record, attempt);

    if (failure.outcome === "rate_limited") {
      const until = registry.recordRateLimit(
        provider.id,
        failure.message,
        finishedAt,
        failure.retryAfterMs
      );
      logger.warn(
        `${provider.id} rate limited, cooling down until ${new Date(until).toISOString()}`
      );
    } else {
      const opened = registry.recordFailure(provider.id, failure.message, finishedAt);
      logger.warn(`${provider.id} failed (${failure.outcome}): ${failure.message}`);
      if (opened) {
        logger.warn(`Circuit opened for ${provider.id}`);
      }
    }

    if (request.signal?.aborted) {
      return fail("cancelled", CANCELLED_MESSAGE);
    }
  }

  if (attempts.length === 0) {
    logger.error("No eligible providers");
    return fail(
      "no_eligible_providers",
      "No eligible providers: every provider is disabled, rate limited or has an open circuit"
    );
  }

  const exhausted = new AllProvidersExhaustedError(
    attempts.map(({ providerId, outcome, error }) => ({ providerId, outcome, error }))
  );
  logger.error(exhausted.message);
  return fail("all_providers_exhausted", exhausted.message);
};
