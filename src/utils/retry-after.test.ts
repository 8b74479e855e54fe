import { describe, it, expect } from "vitest";
import { parseRetryAfter, readHeader, retryAfterSeconds } from "./retry-after.js";

describe("parseRetryAfter", () => {
  it("parses delta seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
  });

  it("parses an HTTP date", () => {
    const now = Date.parse("2025-01-01T00:00:00Z");

    expect(parseRetryAfter("Wed, 01 Jan 2025 00:01:00 GMT", now)).toBe(60_000);
  });

  it("returns undefined for garbage", () => {
    expect(parseRetryAfter("soon")).toBeUndefined();
    expect(parseRetryAfter(null)).toBeUndefined();
  });
});

describe("readHeader", () => {
  it("reads Headers and plain records case-insensitively", () => {
    expect(readHeader(new Headers({ "Retry-After": "5" }), "retry-after")).toBe("5");
    expect(readHeader({ "retry-after": "7" }, "Retry-After")).toBe("7");
    expect(readHeader(undefined, "retry-after")).toBeUndefined();
  });
});

describe("retryAfterSeconds", () => {
  it("rounds up to whole seconds", () => {
    expect(retryAfterSeconds({ "retry-after": "1.2" })).toBe(2);
  });

  it("returns undefined without the header", () => {
    expect(retryAfterSeconds(new Headers())).toBeUndefined();
  });
});
