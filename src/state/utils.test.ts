import { describe, it, expect } from "vitest";
import { calculateUpdatedLatency, createInitialState } from "./utils.js";

describe("calculateUpdatedLatency", () => {
  it("uses the first sample as the average", () => {
    expect(calculateUpdatedLatency(null, 0, 120)).toEqual({ averageMs: 120, sampleCount: 1 });
  });

  it("averages old and new with the default decay", () => {
    const first = calculateUpdatedLatency(null, 0, 100);
    const second = calculateUpdatedLatency(first.averageMs, first.sampleCount, 300);
    const third = calculateUpdatedLatency(second.averageMs, second.sampleCount, 600);

    expect(second.averageMs).toBe(200);
    expect(third).toEqual({ averageMs: 400, sampleCount: 3 });
  });

  it("weights history by the decay", () => {
    const result = calculateUpdatedLatency(100, 1, 200, { decay: 0.75, maxSamples: 10 });

    expect(result.averageMs).toBe(125);
  });

  it("caps the sample count", () => {
    expect(calculateUpdatedLatency(100, 10, 100, { decay: 0.5, maxSamples: 10 }).sampleCount).toBe(10);
  });
});

describe("createInitialState", () => {
  it("starts enabled providers as selectable", () => {
    expect(createInitialState(true).disabled).toBe(false);
  });

  it("starts disabled providers as disabled", () => {
    const state = createInitialState(false);

    expect(state.disabled).toBe(true);
    expect(state.averageResponseMs).toBeNull();
  });
});
