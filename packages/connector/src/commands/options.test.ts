import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { errorMessage, parsePositiveInt } from "./options.js";

describe("parsePositiveInt", () => {
  it("accepts positive integers, ignoring surrounding whitespace", () => {
    expect(parsePositiveInt("8")).toBe(8);
    expect(parsePositiveInt(" 12 ")).toBe(12);
  });

  it.each(["0", "-3", "1.5", "abc", ""])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt(value)).toThrow(`Expected a positive integer, got "${value}".`);
  });
});

describe("errorMessage", () => {
  it("uses the message of errors and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
