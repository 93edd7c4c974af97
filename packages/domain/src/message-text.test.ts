import { describe, expect, it } from "vitest";
import {
  hasIcuSyntax,
  normalizeMessageParams,
  stringifyParam,
  substitutePlaceholders,
} from "./message-text.js";

describe("message text helpers", () => {
  it("normalizes params to a key/value record", () => {
    expect(normalizeMessageParams(undefined)).toEqual({});
    expect(normalizeMessageParams(null)).toEqual({});
    expect(normalizeMessageParams(["a", 2])).toEqual({ "0": "a", "1": 2 });
    expect(normalizeMessageParams({ name: "Ada" })).toEqual({ name: "Ada" });
  });

  it("detects ICU argument syntax", () => {
    expect(
      hasIcuSyntax("{count, plural, one{1 item} other{# items}}"),
    ).toBe(true);
    expect(hasIcuSyntax("Total: { n ,number}")).toBe(true);
    expect(hasIcuSyntax("Hello, {username}!")).toBe(false);
    expect(hasIcuSyntax("{a b, c}")).toBe(false);
    expect(hasIcuSyntax("{число, plural, other{# файлов}}")).toBe(true);
    expect(hasIcuSyntax("{número,number}")).toBe(true);
  });

  it("replaces known placeholders and keeps unknown ones", () => {
    expect(
      substitutePlaceholders("Hello, {username}! You have {count} {things}.", {
        username: "Alexander",
        count: 3,
      }),
    ).toBe("Hello, Alexander! You have 3 {things}.");
  });

  it("substitutes positional params", () => {
    expect(
      substitutePlaceholders("{0} and {1}", normalizeMessageParams(["x", "y"])),
    ).toBe("x and y");
  });

  it("does not resolve inherited keys", () => {
    expect(substitutePlaceholders("{toString}", {})).toBe("{toString}");
  });

  it("stringifies params", () => {
    expect(stringifyParam(null)).toBe("");
    expect(stringifyParam(undefined)).toBe("");
    expect(stringifyParam(new Date(Date.UTC(2024, 0, 2)))).toBe(
      "2024-01-02T00:00:00.000Z",
    );
    expect(stringifyParam(false)).toBe("false");
  });
});
