import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  getDefaultRegistryPath,
  loadProviderRegistry,
  providersFromRegistry,
} from "./loader.js";
import { ConfigValidationError } from "../types/errors.js";
import { resolveConfig } from "../types/config.js";

describe("config loader", () => {
  let dir: string;

  const writeRegistry = (content: string): string => {
    const filePath = join(dir, "providers.yml");
    writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "registry-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("loadProviderRegistry", () => {
    it("should convert snake_case entries and apply defaults", () => {
      const path = writeRegistry(`
defaults:
  timeout_ms: 20000
  max_tokens: 1024
providers:
  - id: alpha
    name: Alpha
    adapter: openai-compatible
    base_url: https://alpha.example.com/v1
    api_key_env: ALPHA_KEY
    model: alpha-large
    priority: 2
    max_tokens: 2048
    headers:
      X-Title: router
  - id: beta
    adapter: anthropic
    api_key_env: BETA_KEY
    model: beta-1
    priority: 1
    enabled: false
`);

      const registry = loadProviderRegistry(path);

      expect(registry.filePath).toBe(path);
      expect(registry.providers).toHaveLength(2);
      expect(registry.providers[0]).toEqual({
        id: "alpha",
        name: "Alpha",
        adapter: "openai-compatible",
        baseUrl: "https://alpha.example.com/v1",
        baseUrlEnv: undefined,
        apiKeyEnv: "ALPHA_KEY",
        model: "alpha-large",
        priority: 2,
        timeoutMs: 20000,
        maxTokens: 2048,
        temperature: undefined,
        headers: { "X-Title": "router" },
        apiVersion: undefined,
        enabled: true,
      });
      expect(registry.providers[1]?.enabled).toBe(false);
      expect(registry.providers[1]?.maxTokens).toBe(1024);
    });

    it("should reject an unknown adapter", () => {
      const path = writeRegistry(`
providers:
  - id: alpha
    adapter: telegraph
    api_key_env: ALPHA_KEY
    model: m
    priority: 1
`);

      expect(() => loadProviderRegistry(path)).toThrow(ConfigValidationError);
      expect(() => loadProviderRegistry(path)).toThrow(
        `Configuration error: provider "alpha": unknown adapter "telegraph" (in ${path})`
      );
    });

    it("should require api_key_env", () => {
      const path = writeRegistry(`
providers:
  - id: alpha
    adapter: gemini
    model: m
    priority: 1
`);

      expect(() => loadProviderRegistry(path)).toThrow(`"api_key_env" is required`);
    });

    it("should reject a non-numeric priority", () => {
      const path = writeRegistry(`
providers:
  - id: alpha
    adapter: gemini
    api_key_env: KEY
    model: m
    priority: first
`);

      expect(() => loadProviderRegistry(path)).toThrow(`"priority" must be a number`);
    });

    it("should reject duplicate ids", () => {
      const path = writeRegistry(`
providers:
  - { id: alpha, adapter: gemini, api_key_env: A, model: m, priority: 1 }
  - { id: alpha, adapter: cohere, api_key_env: B, model: m, priority: 2 }
`);

      expect(() => loadProviderRegistry(path)).toThrow(`Duplicate provider id "alpha"`);
    });

    it("should require an endpoint for azure-openai", () => {
      const path = writeRegistry(`
providers:
  - { id: az, adapter: azure-openai, api_key_env: A, model: dep, priority: 1 }
`);

      expect(() => loadProviderRegistry(path)).toThrow(
        `azure-openai needs "base_url" or "base_url_env"`
      );
    });

    it("should reject an empty provider list", () => {
      const path = writeRegistry("providers: []\n");

      expect(() => loadProviderRegistry(path)).toThrow(
        `"providers" must be a non-empty list`
      );
    });

    it("should report a missing file as a validation error", () => {
      const path = join(dir, "missing.yml");

      expect(() => loadProviderRegistry(path)).toThrow(ConfigValidationError);
    });

    it("should load the bundled registry", () => {
      const registry = loadProviderRegistry();

      expect(registry.filePath).toBe(getDefaultRegistryPath());
      expect(registry.providers[0]?.id).toBe("deepseek");
      expect(registry.providers.every((p) => p.apiKeyEnv.endsWith("_KEY"))).toBe(true);
    });
  });

  describe("providersFromRegistry", () => {
    it("should read keys from the environment and keep missing ones as null", () => {
      const path = writeRegistry(`
providers:
  - { id: alpha, adapter: gemini, api_key_env: ALPHA_KEY, model: m, priority: 1 }
  - { id: beta, adapter: cohere, api_key_env: BETA_KEY, model: m, priority: 2 }
`);

      const providers = providersFromRegistry(loadProviderRegistry(path), {
        ALPHA_KEY: "test-key",
        BETA_KEY: "  ",
      });

      expect(providers.map((p) => [p.id, p.apiKey])).toEqual([
        ["alpha", "test-key"],
        ["beta", null],
      ]);

      const resolved = resolveConfig({ providers });
      expect(resolved.providers[1]?.enabled).toBe(false);
      expect(resolved.providers[1]?.disabledReason).toBe("missing_credential");
    });

    it("should read an azure endpoint from its variable", () => {
      const path = writeRegistry(`
providers:
  - id: az
    adapter: azure-openai
    base_url_env: AZ_ENDPOINT
    api_key_env: AZ_KEY
    model: dep
    priority: 1
`);
      const registry = loadProviderRegistry(path);

      const [configured] = providersFromRegistry(registry, {
        AZ_KEY: "test-key",
        AZ_ENDPOINT: "https://example.openai.azure.com",
      });
      expect(configured?.baseUrl).toBe("https://example.openai.azure.com");
      expect(configured?.enabled).toBe(true);

      const unset = providersFromRegistry(registry, { AZ_KEY: "test-key" });
      expect(unset[0]?.baseUrl).toBeNull();

      const resolved = resolveConfig({
        providers: [...unset, { id: "backup", adapter: "gemini", apiKey: "test-key", model: "m" }],
      });
      expect(resolved.providers[0]).toMatchObject({
        enabled: false,
        disabledReason: "missing_endpoint",
      });
    });

    it("should leave the default endpoint to non-azure providers", () => {
      const path = writeRegistry(`
providers:
  - { id: alpha, adapter: gemini, api_key_env: ALPHA_KEY, model: m, priority: 1 }
`);

      const [alpha] = providersFromRegistry(loadProviderRegistry(path), { ALPHA_KEY: "test-key" });

      expect(alpha?.baseUrl).toBeUndefined();
    });
  });
});
