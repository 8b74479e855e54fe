import { describe, it, expect } from "vitest";
import { createFastestStrategy } from "./fastest.js";
import { createContext, createMockCandidate, ids } from "./test-helpers.js";

describe("FastestStrategy", () => {
  const strategy = createFastestStrategy();

  it("should order by rolling average, unsampled last", () => {
    const candidates = [
      createMockCandidate("unsampled", 0),
      createMockCandidate("slow", 1, { averageResponseMs: 900 }),
      createMockCandidate("quick", 2, { averageResponseMs: 120 }),
    ];

    expect(ids(strategy.rank(candidates, createContext()))).toEqual([
      "quick",
      "slow",
      "unsampled",
    ]);
  });

  it("should break latency ties by priority", () => {
    const candidates = [
      createMockCandidate("later", 5, { averageResponseMs: 100 }),
      createMockCandidate("sooner", 1, { averageResponseMs: 100 }),
    ];

    expect(strategy.select(candidates, createContext())._unsafeUnwrap().config.id).toBe("sooner");
  });
});
