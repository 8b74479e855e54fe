/**
 * Google Gemini generateContent adapter
 *
 * API Docs: https://ai.google.dev/api/generate-content
 */

import type { ResolvedProviderConfig } from "../types/config.js";
import type { ProviderAdapter } from "../types/provider.js";
import { readPath, readNumber, readString } from "../utils/guards.js";
import { splitSystemMessage } from "../utils/messages.js";
import { postJson, requireContent } from "./http.js";

const extractText = (body: unknown): string | undefined => {
  const parts = readPath(body, ["candidates", 0, "content", "parts"]);
  if (!Array.isArray(parts)) return undefined;
  const texts = parts
    .map((part: unknown) => readString(part, ["text"]))
    .filter((text): text is string => text !== undefined);
  return texts.length > 0 ? texts.join("") : undefined;
};

export const createGeminiAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter => ({
  kind: "gemini",

  send: async (request) => {
    const { system, turns } = splitSystemMessage(request.messages);

    const body = await postJson({
      providerId: provider.id,
      url: `${provider.baseUrl}/models/${encodeURIComponent(provider.model)}:generateContent`,
      headers: {
        "x-goog-api-key": provider.apiKey ?? "",
        ...provider.headers,
      },
      body: {
        contents: turns.map((m) => ({
          role: m.role === "assistant" ? "model" : "user",
          parts: [{ text: m.content }],
        })),
        ...(system !== undefined ? { systemInstruction: { parts: [{ text: system }] } } : {}),
        generationConfig: {
          maxOutputTokens: request.maxTokens,
          temperature: request.temperature,
        },
      },
      signal: request.signal,
    });

    return {
      content: requireContent(provider.id, extractText(body), body),
      model: readString(body, ["modelVersion"]),
      tokensUsed: readNumber(body, ["usageMetadata", "totalTokenCount"]) ?? 0,
    };
  },
});
