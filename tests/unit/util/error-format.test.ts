import { describe, expect, it } from "vitest";
import { formatError } from "../../../src/util/error-format.js";

describe("formatError", () => {
  it("trims strings and error messages", () => {
    expect(formatError("  boom ")).toBe("boom");
    expect(formatError(new Error(" lost connection "))).toBe("lost connection");
  });

  it("joins nested errors when the message is empty", () => {
    expect(formatError(new AggregateError([new Error("a"), "b"], ""))).toBe("a | b");
  });

  it("prefers code and message of plain objects", () => {
    expect(formatError({ code: "ECONNREFUSED", message: "refused" })).toBe("ECONNREFUSED: refused");
    expect(formatError({ code: "ECONNREFUSED" })).toBe("ECONNREFUSED");
  });

  it("falls back to JSON or a placeholder", () => {
    expect(formatError({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(formatError(null)).toBe("unknown_error");
    expect(formatError("")).toBe("unknown_error");
  });
});
