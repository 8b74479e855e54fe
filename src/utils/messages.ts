/**
 * Message utilities for turning a prompt into chat messages.
 */

import type { ChatMessage } from "../types/provider.js";

/**
 * Build the chat messages for a request
 *
 * A blank system prompt is dropped rather than sent as an empty message.
 */
export const buildMessages = (
  prompt: string,
  systemPrompt?: string
): ChatMessage[] => {
  const messages: ChatMessage[] = [];
  if (systemPrompt !== undefined && systemPrompt.trim() !== "") {
    messages.push({ role: "system", content: systemPrompt });
  }
  messages.push({ role: "user", content: prompt });
  return messages;
};

/**
 * Split messages into the system text and the conversation turns
 *
 * For APIs that take the system prompt as a separate field.
 */
export const splitSystemMessage = (
  messages: readonly ChatMessage[]
): { system: string | undefined; turns: ChatMessage[] } => {
  const systemParts = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content);
  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    turns: messages.filter((m) => m.role !== "system"),
  };
};

/**
 * Flatten messages into a single prompt for text-only endpoints
 */
export const flattenMessages = (messages: readonly ChatMessage[]): string =>
  messages
    .map((m) => (m.role === "user" ? m.content : `${m.role}: ${m.content}`))
    .join("\n\n");
