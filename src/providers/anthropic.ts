/**
 * Anthropic Messages API adapter
 *
 * API Docs: https://docs.anthropic.com/en/api/messages
 */

import type { ResolvedProviderConfig } from "../types/config.js";
import type { ProviderAdapter } from "../types/provider.js";
import { readPath, readNumber, readString } from "../utils/guards.js";
import { splitSystemMessage } from "../utils/messages.js";
import { postJson, requireContent } from "./http.js";

export const DEFAULT_ANTHROPIC_VERSION = "2023-06-01";

/**
 * Concatenate the text blocks of a Messages response
 */
const extractText = (body: unknown): string | undefined => {
  const blocks = readPath(body, ["content"]);
  if (!Array.isArray(blocks)) return undefined;
  const texts = blocks
    .map((block: unknown) =>
      readString(block, ["type"]) === "text" ? readString(block, ["text"]) : undefined
    )
    .filter((text): text is string => text !== undefined);
  return texts.length > 0 ? texts.join("") : undefined;
};

export const createAnthropicAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter => ({
  kind: "anthropic",

  send: async (request) => {
    const { system, turns } = splitSystemMessage(request.messages);

    const body = await postJson({
      providerId: provider.id,
      url: `${provider.baseUrl}/messages`,
      headers: {
        "x-api-key": provider.apiKey ?? "",
        "anthropic-version": provider.apiVersion ?? DEFAULT_ANTHROPIC_VERSION,
        ...provider.headers,
      },
      body: {
        model: provider.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(system !== undefined ? { system } : {}),
        messages: turns.map((m) => ({ role: m.role, content: m.content })),
      },
      signal: request.signal,
    });

    return {
      content: requireContent(provider.id, extractText(body), body),
      model: readString(body, ["model"]),
      tokensUsed:
        (readNumber(body, ["usage", "input_tokens"]) ?? 0) +
        (readNumber(body, ["usage", "output_tokens"]) ?? 0),
    };
  },
});
