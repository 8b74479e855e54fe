/**
 * Providers Module
 *
 * One adapter per remote API family. `createAdapter` picks the adapter
 * for a resolved provider; vendors speaking the OpenAI protocol all share
 * the openai-compatible adapter with their own base URL.
 */

import type { ResolvedProviderConfig } from "../types/config.js";
import type { ProviderAdapter } from "../types/provider.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createCohereAdapter } from "./cohere.js";
import { createGeminiAdapter } from "./gemini.js";
import { createHuggingFaceAdapter } from "./huggingface.js";
import {
  createAzureOpenAIAdapter,
  createOpenAICompatibleAdapter,
} from "./openai-compatible.js";

export {
  createOpenAICompatibleAdapter,
  createAzureOpenAIAdapter,
  mapSdkError,
  DEFAULT_AZURE_API_VERSION,
} from "./openai-compatible.js";
export { createAnthropicAdapter, DEFAULT_ANTHROPIC_VERSION } from "./anthropic.js";
export { createGeminiAdapter } from "./gemini.js";
export { createCohereAdapter } from "./cohere.js";
export { createHuggingFaceAdapter } from "./huggingface.js";
export { postJson, requireContent, hasRateLimitCode, type PostJsonRequest } from "./http.js";

/**
 * Create the adapter for a provider
 */
export const createAdapter = (provider: ResolvedProviderConfig): ProviderAdapter => {
  switch (provider.adapter) {
    case "openai-compatible":
      return createOpenAICompatibleAdapter(provider);
    case "azure-openai":
      return createAzureOpenAIAdapter(provider);
    case "anthropic":
      return createAnthropicAdapter(provider);
    case "gemini":
      return createGeminiAdapter(provider);
    case "cohere":
      return createCohereAdapter(provider);
    case "huggingface":
      return createHuggingFaceAdapter(provider);
  }
};
