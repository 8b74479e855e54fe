/**
 * OpenAI-compatible adapters
 *
 * Uses the official OpenAI SDK for every vendor that speaks the chat
 * completions protocol (set `baseUrl` to point it elsewhere), and its
 * AzureOpenAI client for Azure deployments. SDK retries are off: the
 * router does its own fallback.
 */

import OpenAI, { AzureOpenAI } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ResolvedProviderConfig } from "../types/config.js";
import type {
  AdapterKind,
  ChatMessage,
  CompletionResponse,
  ProviderAdapter,
} from "../types/provider.js";
import {
  AuthenticationError,
  ConfigurationError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  TransportError,
} from "../types/errors.js";
import { retryAfterSeconds } from "../utils/retry-after.js";
import { requireContent } from "./http.js";

/** Azure API version used when the provider sets none */
export const DEFAULT_AZURE_API_VERSION = "2024-10-21";

const toMessageParam = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
};

/**
 * Translate an SDK error into a router error
 *
 * Aborts pass through untouched so the caller's timeout and cancellation
 * flags decide the outcome.
 */
export const mapSdkError = (provider: ResolvedProviderConfig, error: unknown): unknown => {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TimeoutError(provider.id, provider.timeoutMs);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(provider.id, error.message, error);
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    if (status === 401 || status === 403) {
      return new AuthenticationError(provider.id, status, error.message);
    }
    if (status === 429) {
      return new RateLimitError(provider.id, error.message, retryAfterSeconds(error.headers));
    }
    return new ProviderError(provider.id, status, error.message, error.error);
  }
  return error;
};

const requireApiKey = (provider: ResolvedProviderConfig): string => {
  if (provider.apiKey === null) {
    throw new ConfigurationError(`Provider "${provider.id}" has no API key`);
  }
  return provider.apiKey;
};

const createSdkAdapter = (
  kind: AdapterKind,
  provider: ResolvedProviderConfig,
  client: OpenAI
): ProviderAdapter => ({
  kind,

  send: async (request): Promise<CompletionResponse> => {
    try {
      const completion = await client.chat.completions.create(
        {
          model: provider.model,
          messages: request.messages.map(toMessageParam),
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          stream: false,
        },
        { signal: request.signal }
      );

      const content = completion.choices[0]?.message.content ?? undefined;
      return {
        content: requireContent(provider.id, content, completion),
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens ?? 0,
      };
    } catch (error) {
      throw mapSdkError(provider, error);
    }
  },
});

/**
 * Adapter for any OpenAI chat completions endpoint
 *
 * @example
 * ```typescript
 * const adapter = createOpenAICompatibleAdapter(resolveConfig({
 *   providers: [{
 *     id: "deepseek",
 *     adapter: "openai-compatible",
 *     baseUrl: "https://api.deepseek.com/v1",
 *     model: "deepseek-chat",
 *     apiKey: process.env.DEEPSEEK_API_KEY,
 *   }],
 * }).providers[0]);
 * ```
 */
export const createOpenAICompatibleAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter =>
  createSdkAdapter(
    "openai-compatible",
    provider,
    new OpenAI({
      apiKey: requireApiKey(provider),
      baseURL: provider.baseUrl,
      timeout: provider.timeoutMs,
      maxRetries: 0,
      defaultHeaders: provider.headers,
    })
  );

/**
 * Adapter for an Azure OpenAI deployment
 *
 * `baseUrl` is the resource endpoint and `model` the deployment name.
 */
export const createAzureOpenAIAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter =>
  createSdkAdapter(
    "azure-openai",
    provider,
    new AzureOpenAI({
      apiKey: requireApiKey(provider),
      endpoint: provider.baseUrl,
      deployment: provider.model,
      apiVersion: provider.apiVersion ?? DEFAULT_AZURE_API_VERSION,
      timeout: provider.timeoutMs,
      maxRetries: 0,
      defaultHeaders: provider.headers,
    })
  );
