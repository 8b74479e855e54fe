import { describe, it, expect } from "vitest";
import {
  buildCandidates,
  countInScope,
  createProviderScope,
  selectProvider,
} from "./provider-selection.js";
import { createProviderRegistry, type ProviderRegistry } from "../state/registry.js";
import { createCircuitBreaker } from "../circuit-breaker/breaker.js";
import { createRateLimiter } from "../rate-limit/limiter.js";
import { resolveConfig } from "../types/config.js";
import { createPriorityStrategy } from "../strategies/priority.js";
import { createContext } from "../strategies/test-helpers.js";

const buildRegistry = (): ProviderRegistry => {
  const config = resolveConfig({
    providers: [
      { id: "a", adapter: "openai-compatible", model: "m-a", apiKey: "test-key", priority: 1 },
      { id: "b", adapter: "openai-compatible", model: "m-b", apiKey: "test-key", priority: 2 },
      { id: "c", adapter: "openai-compatible", model: "m-c", apiKey: "test-key", priority: 3 },
      { id: "off", adapter: "anthropic", model: "m-d", apiKey: null, priority: 0 },
    ],
  });
  return createProviderRegistry({
    providers: config.providers,
    circuitBreaker: createCircuitBreaker({ failureThreshold: 1, cooldownMs: 1000 }),
    rateLimiter: createRateLimiter(),
  });
};

const strategy = createPriorityStrategy();

const selectedId = (
  registry: ProviderRegistry,
  request: Parameters<typeof createProviderScope>[0],
  excluded: string[] = []
): string =>
  selectProvider(createContext(excluded), {
    registry,
    strategy,
    now: 0,
    scope: createProviderScope(request),
  })._unsafeUnwrap().config.id;

describe("createProviderScope", () => {
  it("should treat a missing or empty allowed list as unrestricted", () => {
    expect(createProviderScope({})).toEqual({ allowed: null, preferred: [] });
    expect(createProviderScope({ allowedProviders: [] }).allowed).toBeNull();
  });

  it("should keep the preferred order", () => {
    expect(createProviderScope({ preferredProviders: ["c", "a"] }).preferred).toEqual(["c", "a"]);
  });
});

describe("buildCandidates", () => {
  it("should drop providers outside the allowed list", () => {
    const registry = buildRegistry();
    const scope = createProviderScope({ allowedProviders: ["c", "b", "unknown"] });

    expect(buildCandidates(registry, 0, scope).map((c) => c.config.id)).toEqual(["b", "c"]);
  });
});

describe("countInScope", () => {
  it("should count enabled providers the request may try", () => {
    const registry = buildRegistry();

    expect(countInScope(registry, createProviderScope({}))).toBe(3);
    expect(countInScope(registry, createProviderScope({ allowedProviders: ["a", "off"] }))).toBe(1);
  });
});

describe("selectProvider", () => {
  it("should follow the strategy without a scope", () => {
    expect(selectedId(buildRegistry(), {})).toBe("a");
  });

  it("should restrict the strategy to allowed providers", () => {
    expect(selectedId(buildRegistry(), { allowedProviders: ["b", "c"] })).toBe("b");
  });

  it("should try preferred providers first, in listed order", () => {
    const registry = buildRegistry();
    const request = { preferredProviders: ["c", "b"] };

    expect(selectedId(registry, request)).toBe("c");
    expect(selectedId(registry, request, ["c"])).toBe("b");
    expect(selectedId(registry, request, ["c", "b"])).toBe("a");
  });

  it("should skip a preferred provider that is not eligible", () => {
    const registry = buildRegistry();
    registry.recordFailure("c", "down", 0);

    expect(selectedId(registry, { preferredProviders: ["off", "c", "b"] })).toBe("b");
  });

  it("should not prefer a provider outside the allowed list", () => {
    expect(
      selectedId(buildRegistry(), { allowedProviders: ["a", "b"], preferredProviders: ["c", "b"] })
    ).toBe("b");
  });

  it("should report no eligible providers when the allowed list matches none", () => {
    const result = selectProvider(createContext(), {
      registry: buildRegistry(),
      strategy,
      now: 0,
      scope: createProviderScope({ allowedProviders: ["off", "unknown"] }),
    });

    expect(result._unsafeUnwrapErr()).toEqual({ type: "no_eligible_providers" });
  });
});
