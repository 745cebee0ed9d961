import { describe, it, expect } from "vitest";

import { Result, Severity } from "./result.js";

describe("Result", () => {
  it("wraps a value without messages", () => {
    const result = Result.ok(5);

    expect(result).toEqual({ success: true, value: 5, messages: {} });
    expect(Result.hasErrors(result)).toBe(false);
    expect(Result.unwrap(result)).toBe(5);
  });

  it("groups errors under the error severity", () => {
    const result = Result.err<number, string>(["first", "second"]);

    expect(result).toEqual({
      success: false,
      messages: { [Severity.Error]: ["first", "second"] },
    });
    expect(Result.firstError(result)).toBe("first");
  });

  it("keeps warnings on success", () => {
    const result = Result.okWith(1, { [Severity.Warning]: ["careful"] });

    expect(result.success).toBe(true);
    expect(Result.hasErrors(result)).toBe(false);
    expect(result.messages[Severity.Warning]).toEqual(["careful"]);
  });

  it("maps values and passes failures through", () => {
    expect(Result.map(Result.ok(2), (n) => n * 3)).toEqual(Result.ok(6));

    const failed = Result.err<number, string>("broken");
    expect(Result.map(failed, (n) => n * 3)).toBe(failed);
  });

  it("merges messages when chaining", () => {
    const first = Result.okWith<number, string>(1, {
      [Severity.Warning]: ["a"],
    });
    const chained = Result.andThen(first, (n) =>
      Result.okWith(n + 1, { [Severity.Warning]: ["b"] }),
    );

    expect(chained).toEqual({
      success: true,
      value: 2,
      messages: { [Severity.Warning]: ["a", "b"] },
    });
  });

  it("rethrows the first error when unwrapping a failure", () => {
    const error = new Error("boom");

    expect(() => Result.unwrap(Result.err(error))).toThrow(error);
    expect(() => Result.unwrap(Result.err("plain"))).toThrow("plain");
  });
});
