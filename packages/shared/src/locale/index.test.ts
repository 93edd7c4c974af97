import { describe, expect, it } from "vitest";
import {
  firstAcceptedLanguage,
  isSameLanguage,
  languageLookupChain,
  normalizeLanguage,
} from "./index.js";

describe("locale helpers", () => {
  it("falls back to the default language", () => {
    expect(normalizeLanguage()).toBe("en-US");
    expect(normalizeLanguage("  ")).toBe("en-US");
  });

  it("normalizes separators and casing", () => {
    expect(normalizeLanguage("en_us")).toBe("en-US");
    expect(normalizeLanguage("PT-br")).toBe("pt-BR");
    expect(normalizeLanguage("zh_hans_cn")).toBe("zh-Hans-CN");
    expect(normalizeLanguage("fr")).toBe("fr");
  });

  it("compares languages after normalization", () => {
    expect(isSameLanguage("en_us", "en-US")).toBe(true);
    expect(isSameLanguage("en", "en-US")).toBe(false);
  });

  it("builds a generic-first lookup chain", () => {
    expect(languageLookupChain("de-DE")).toEqual(["de", "de-DE"]);
    expect(languageLookupChain("en_us")).toEqual(["en", "en_us"]);
    expect(languageLookupChain("fr")).toEqual(["fr"]);
  });

  it("reads the first concrete tag of an accept-language header", () => {
    expect(firstAcceptedLanguage("de-DE,de;q=0.9,en;q=0.8")).toBe("de-DE");
    expect(firstAcceptedLanguage("*, fr;q=0.5")).toBe("fr");
    expect(firstAcceptedLanguage("")).toBeNull();
    expect(firstAcceptedLanguage(undefined)).toBeNull();
  });
});
