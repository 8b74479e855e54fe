/**
 * Cohere chat adapter (v1 chat endpoint)
 *
 * API Docs: https://docs.cohere.com/reference/chat
 */

import type { ResolvedProviderConfig } from "../types/config.js";
import type { ChatMessage, ProviderAdapter } from "../types/provider.js";
import { readNumber, readString } from "../utils/guards.js";
import { splitSystemMessage } from "../utils/messages.js";
import { postJson, requireContent } from "./http.js";

interface CohereTurn {
  role: "USER" | "CHATBOT";
  message: string;
}

/**
 * Split turns into Cohere's chat history and the final message
 */
const toCohereChat = (
  turns: readonly ChatMessage[]
): { message: string; chatHistory: CohereTurn[] } => {
  const last = turns[turns.length - 1];
  const history = last ? turns.slice(0, -1) : [];
  return {
    message: last?.content ?? "",
    chatHistory: history.map((m): CohereTurn => ({
      role: m.role === "assistant" ? "CHATBOT" : "USER",
      message: m.content,
    })),
  };
};

export const createCohereAdapter = (
  provider: ResolvedProviderConfig
): ProviderAdapter => ({
  kind: "cohere",

  send: async (request) => {
    const { system, turns } = splitSystemMessage(request.messages);
    const { message, chatHistory } = toCohereChat(turns);

    const body = await postJson({
      providerId: provider.id,
      url: `${provider.baseUrl}/chat`,
      headers: {
        Authorization: `Bearer ${provider.apiKey ?? ""}`,
        ...provider.headers,
      },
      body: {
        model: provider.model,
        message,
        ...(chatHistory.length > 0 ? { chat_history: chatHistory } : {}),
        ...(system !== undefined ? { preamble: system } : {}),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      signal: request.signal,
    });

    return {
      content: requireContent(provider.id, readString(body, ["text"]), body),
      tokensUsed:
        (readNumber(body, ["meta", "billed_units", "input_tokens"]) ?? 0) +
        (readNumber(body, ["meta", "billed_units", "output_tokens"]) ?? 0),
    };
  },
});
