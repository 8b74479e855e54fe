/**
 * Hugging Face Inference API adapter (text generation)
 *
 * API Docs: https://huggingface.co/docs/api-inference
 */

import type { ResolvedProviderConfig } from "../types/config.js";
import type { ProviderAdapter } from "../types/provider.js";
import { readString } from "../utils/guards.js";
import { flattenMessages } from "../utils/messages.js";
import { postJson, requireContent } from "./http.js";

/**
 * The endpoint answers with a list of generations or a single object
 */
const extractText = (body: unknown): string | undefined =>
  readString(body, [0, "generated_text"]) ?? readString(body, ["generated_text"]);

export const createHuggingFaceAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter => ({
  kind: "huggingface",

  send: async (request) => {
    const body = await postJson({
      providerId: provider.id,
      url: `${provider.baseUrl}/${provider.model}`,
      headers: {
        Authorization: `Bearer ${provider.apiKey ?? ""}`,
        ...provider.headers,
      },
      body: {
        inputs: flattenMessages(request.messages),
        parameters: {
          max_new_tokens: request.maxTokens,
          temperature: request.temperature,
          return_full_text: false,
        },
      },
      signal: request.signal,
    });

    return {
      content: requireContent(provider.id, extractText(body), body),
      tokensUsed: 0,
    };
  },
});
