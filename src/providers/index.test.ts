import { describe, it, expect, vi } from "vitest";

vi.mock("openai", () => {
  class MockOpenAI {
    chat = { completions: { create: vi.fn() } };
  }
  class MockAzureOpenAI extends MockOpenAI {}
  return { default: MockOpenAI, AzureOpenAI: MockAzureOpenAI };
});

import { createAdapter } from "./index.js";
import { ADAPTER_KINDS } from "../types/provider.js";
import { createTestProvider } from "./test-helpers.js";

describe("createAdapter", () => {
  it("should create an adapter for every kind", () => {
    for (const kind of ADAPTER_KINDS) {
      expect(createAdapter(createTestProvider(kind)).kind).toBe(kind);
    }
  });
});
