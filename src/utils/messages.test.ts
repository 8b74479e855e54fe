import { describe, it, expect } from "vitest";
import { buildMessages, splitSystemMessage, flattenMessages } from "./messages.js";

describe("buildMessages", () => {
  it("should build a single user message", () => {
    expect(buildMessages("hello")).toEqual([{ role: "user", content: "hello" }]);
  });

  it("should put the system prompt first", () => {
    expect(buildMessages("hello", "be brief")).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "hello" },
    ]);
  });

  it("should drop a blank system prompt", () => {
    expect(buildMessages("hello", "   ")).toEqual([
      { role: "user", content: "hello" },
    ]);
  });
});

describe("splitSystemMessage", () => {
  it("should separate system text from turns", () => {
    const result = splitSystemMessage(buildMessages("hello", "be brief"));

    expect(result.system).toBe("be brief");
    expect(result.turns).toEqual([{ role: "user", content: "hello" }]);
  });

  it("should return undefined system when there is none", () => {
    expect(splitSystemMessage(buildMessages("hello")).system).toBeUndefined();
  });
});

describe("flattenMessages", () => {
  it("should prefix non-user roles", () => {
    expect(flattenMessages(buildMessages("hello", "be brief"))).toBe(
      "system: be brief\n\nhello"
    );
  });
});
