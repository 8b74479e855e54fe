import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createHuggingFaceAdapter } from "./huggingface.js";
import { createTestProvider, createTestRequest, fetchBody } from "./test-helpers.js";
import { ProviderError } from "../types/errors.js";

describe("Hugging Face adapter", () => {
  const adapter = createHuggingFaceAdapter(
    createTestProvider("huggingface", { model: "org/model" })
  );

  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a flattened prompt to the model endpoint", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify([{ generated_text: "ok" }]), { status: 200 })
    );

    const response = await adapter.send(createTestRequest("Hello", "be brief"));

    expect(vi.mocked(fetch).mock.calls[0]?.[0]).toBe(
      "https://api-inference.huggingface.co/models/org/model"
    );
    expect(fetchBody(vi.mocked(fetch).mock.calls[0])).toEqual({
      inputs: "system: be brief\n\nHello",
      parameters: { max_new_tokens: 64, temperature: 0.5, return_full_text: false },
    });
    expect(response).toEqual({ content: "ok", tokensUsed: 0 });
  });

  it("reports a loading model as a provider error", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify({ error: "Model org/model is currently loading" }), {
        status: 503,
      })
    );

    const error = await adapter.send(createTestRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ statusCode: 503 });
  });
});
