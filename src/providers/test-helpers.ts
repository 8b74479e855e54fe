import type { ResolvedProviderConfig } from "../types/config.js";
import type { AdapterKind, CompletionRequest } from "../types/provider.js";
import { DEFAULT_BASE_URLS } from "../types/config.js";
import { buildMessages } from "../utils/messages.js";

/**
 * Resolved provider for adapter tests
 */
export const createTestProvider = (
  adapter: AdapterKind,
  overrides: Partial<ResolvedProviderConfig> = {}
): ResolvedProviderConfig => ({
  id: `${adapter}-test`,
  name: `${adapter} test`,
  adapter,
  apiKey: "test-key",
  baseUrl: DEFAULT_BASE_URLS[adapter] ?? "https://example.openai.azure.com",
  model: "test-model",
  priority: 1,
  timeoutMs: 5_000,
  maxTokens: 128,
  temperature: 0.2,
  enabled: true,
  disabledReason: null,
  headers: {},
  ...overrides,
});

export const createTestRequest = (
  prompt = "Hello",
  systemPrompt?: string
): CompletionRequest => ({
  messages: buildMessages(prompt, systemPrompt),
  maxTokens: 64,
  temperature: 0.5,
  signal: new AbortController().signal,
});

/**
 * Parsed JSON body of the nth fetch call
 */
export const fetchBody = (call: unknown[] | undefined): unknown => {
  const init = call?.[1];
  if (typeof init !== "object" || init === null || !("body" in init)) {
    return undefined;
  }
  return typeof init.body === "string" ? JSON.parse(init.body) : undefined;
};
