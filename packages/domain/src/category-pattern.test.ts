import { describe, expect, it } from "vitest";
import {
  classifyCategoryPattern,
  findPrefixWildcardMatch,
} from "./category-pattern.js";

describe("category patterns", () => {
  it("classifies catch-all, prefix and exact patterns", () => {
    expect(classifyCategoryPattern("*")).toEqual({ kind: "catch-all" });
    expect(classifyCategoryPattern("app*")).toEqual({
      kind: "prefix",
      prefix: "app",
    });
    expect(classifyCategoryPattern("app/**")).toEqual({
      kind: "prefix",
      prefix: "app/",
    });
    expect(classifyCategoryPattern("app/cat1")).toEqual({
      kind: "exact",
      category: "app/cat1",
    });
  });

  it("treats a leading star as an exact name", () => {
    expect(classifyCategoryPattern("*app")).toEqual({
      kind: "exact",
      category: "*app",
    });
  });

  it("returns the first prefix match in iteration order", () => {
    const patterns = ["*", "app*", "app/admin*", "other"];

    expect(findPrefixWildcardMatch(patterns, "app/admin/users")).toBe("app*");
    expect(
      findPrefixWildcardMatch(["app/admin*", "app*"], "app/admin/users"),
    ).toBe("app/admin*");
  });

  it("returns null when no prefix pattern matches", () => {
    expect(findPrefixWildcardMatch(["*", "app*"], "billing")).toBeNull();
    expect(findPrefixWildcardMatch(["billing"], "billing")).toBeNull();
  });
});
