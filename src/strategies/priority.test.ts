import { describe, it, expect } from "vitest";
import { createPriorityStrategy } from "./priority.js";
import { createContext, createMockCandidate, ids } from "./test-helpers.js";

describe("PriorityStrategy", () => {
  const strategy = createPriorityStrategy();

  it("should have the correct name", () => {
    expect(strategy.name).toBe("priority");
  });

  it("should order providers by ascending priority", () => {
    const candidates = [
      createMockCandidate("p3", 3),
      createMockCandidate("p1", 1),
      createMockCandidate("p2", 2),
    ];

    expect(ids(strategy.rank(candidates, createContext()))).toEqual(["p1", "p2", "p3"]);
  });

  it("should keep registry order for equal priorities", () => {
    const candidates = [
      createMockCandidate("first", 1),
      createMockCandidate("second", 1),
      createMockCandidate("third", 0),
    ];

    expect(ids(strategy.rank(candidates, createContext()))).toEqual([
      "third",
      "first",
      "second",
    ]);
  });

  it("should skip excluded providers", () => {
    const candidates = [createMockCandidate("p1", 1), createMockCandidate("p2", 2)];

    const result = strategy.select(candidates, createContext(["p1"]));

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap().config.id).toBe("p2");
  });

  it("should return no_candidates for an empty list", () => {
    const result = strategy.select([], createContext());

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toBe("no_candidates");
  });

  it("should return all_providers_excluded when every provider was tried", () => {
    const candidates = [createMockCandidate("p1", 1)];

    const result = strategy.select(candidates, createContext(["p1"]));

    expect(result._unsafeUnwrapErr()).toBe("all_providers_excluded");
  });
});
