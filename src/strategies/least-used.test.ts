import { describe, it, expect } from "vitest";
import { calculateUsage, createLeastUsedStrategy } from "./least-used.js";
import { createContext, createMockCandidate, ids } from "./test-helpers.js";

describe("LeastUsedStrategy", () => {
  const strategy = createLeastUsedStrategy();

  it("should count successes and failures as usage", () => {
    expect(calculateUsage(createMockCandidate("p", 1, { successCount: 4, failureCount: 2 }))).toBe(6);
  });

  it("should order by fewest recorded calls", () => {
    const candidates = [
      createMockCandidate("busy", 1, { successCount: 12 }),
      createMockCandidate("idle", 3),
      createMockCandidate("failing", 2, { failureCount: 3 }),
    ];

    expect(ids(strategy.rank(candidates, createContext()))).toEqual([
      "idle",
      "failing",
      "busy",
    ]);
  });

  it("should break usage ties by priority", () => {
    const candidates = [
      createMockCandidate("later", 5, { successCount: 2 }),
      createMockCandidate("sooner", 1, { successCount: 2 }),
    ];

    expect(strategy.select(candidates, createContext())._unsafeUnwrap().config.id).toBe("sooner");
  });

  it("should skip providers already tried", () => {
    const candidates = [
      createMockCandidate("idle", 1),
      createMockCandidate("busy", 2, { successCount: 9 }),
    ];

    expect(strategy.select(candidates, createContext(["idle"]))._unsafeUnwrap().config.id).toBe("busy");
  });

  it("should report when every candidate was tried", () => {
    const candidates = [createMockCandidate("only", 1)];

    expect(strategy.select(candidates, createContext(["only"]))._unsafeUnwrapErr()).toBe(
      "all_providers_excluded"
    );
  });
});
