import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createAnthropicAdapter } from "./anthropic.js";
import { createTestProvider, createTestRequest, fetchBody } from "./test-helpers.js";
import { ProviderError, RateLimitError } from "../types/errors.js";

const mockResponse = {
  model: "claude-test",
  content: [
    { type: "text", text: "Hi " },
    { type: "text", text: "there" },
  ],
  usage: { input_tokens: 10, output_tokens: 5 },
};

describe("Anthropic adapter", () => {
  const adapter = createAnthropicAdapter(createTestProvider("anthropic"));

  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should have the correct kind", () => {
    expect(adapter.kind).toBe("anthropic");
  });

  it("sends the system prompt as a separate field", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify(mockResponse), { status: 200 })
    );

    await adapter.send(createTestRequest("Hello", "be brief"));

    const [url, init] = vi.mocked(fetch).mock.calls[0] ?? [];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(init?.headers).toMatchObject({
      "x-api-key": "test-key",
      "anthropic-version": "2023-06-01",
    });
    expect(fetchBody(vi.mocked(fetch).mock.calls[0])).toEqual({
      model: "test-model",
      max_tokens: 64,
      temperature: 0.5,
      system: "be brief",
      messages: [{ role: "user", content: "Hello" }],
    });
  });

  it("joins text blocks and sums tokens", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify(mockResponse), { status: 200 })
    );

    await expect(adapter.send(createTestRequest())).resolves.toEqual({
      content: "Hi there",
      model: "claude-test",
      tokensUsed: 15,
    });
  });

  it("rejects a response without text", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify({ content: [] }), { status: 200 })
    );

    await expect(adapter.send(createTestRequest())).rejects.toBeInstanceOf(ProviderError);
  });

  it("maps 429 to RateLimitError", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("{}", { status: 429 }));

    await expect(adapter.send(createTestRequest())).rejects.toBeInstanceOf(RateLimitError);
  });
});
