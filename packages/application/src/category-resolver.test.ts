import { describe, expect, it } from "vitest";
import { z } from "zod";

import { CategoryResolver, type CategoryBindings } from "./category-resolver.js";
import { InvalidDescriptorError, NoSourceForCategoryError } from "./errors.js";
import type { MessageSource } from "./message-source.js";
import { ObjectFactory } from "./object-factory.js";

class StubSource implements MessageSource {
  constructor(
    readonly name: string,
    readonly sourceLanguage = "en-US",
  ) {}

  async translate(): Promise<string | null> {
    return null;
  }
}

function createCountingFactory() {
  const built: StubSource[] = [];
  const factory = new ObjectFactory<MessageSource>("message source").register(
    "stub",
    z.object({ name: z.string() }),
    (config) => {
      const source = new StubSource(config.name);
      built.push(source);
      return source;
    },
  );
  return { factory, built };
}

function captureError(work: () => unknown): unknown {
  try {
    work();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

function createResolver(bindings: CategoryBindings) {
  const { factory, built } = createCountingFactory();
  return { resolver: new CategoryResolver(bindings, factory), built };
}

describe("CategoryResolver", () => {
  it("fails when no binding matches", () => {
    const { resolver } = createResolver({ "app*": { class: "stub", name: "a" } });

    expect(() => resolver.resolve("billing")).toThrow(NoSourceForCategoryError);
    expect(() => resolver.resolve("billing")).toThrow(
      "Unable to locate message source for category 'billing'.",
    );
  });

  it("fails on an empty registry", () => {
    const { resolver } = createResolver({});

    const error = captureError(() => resolver.resolve("app"));

    expect(error).toBeInstanceOf(NoSourceForCategoryError);
    if (error instanceof NoSourceForCategoryError) {
      expect(error.code).toBe("NO_SOURCE_FOR_CATEGORY");
      expect(error.httpStatus).toBe(404);
      expect(error.category).toBe("app");
      expect(error.details).toEqual({ category: "app" });
    }
  });

  it("routes by prefix wildcard before the catch-all", () => {
    const s1 = new StubSource("s1");
    const s2 = new StubSource("s2");
    const { resolver } = createResolver({ "app*": s1, "*": s2 });

    expect(resolver.resolve("app/cat1")).toBe(s1);
    expect(resolver.resolve("other")).toBe(s2);
  });

  it("prefers an exact binding over wildcard and catch-all", () => {
    const exact = new StubSource("exact");
    const { resolver } = createResolver({
      "*": new StubSource("all"),
      "app*": new StubSource("app"),
      "app/cat1": exact,
    });

    expect(resolver.resolve("app/cat1")).toBe(exact);
  });

  it("keeps registration order among overlapping prefixes", () => {
    const { resolver } = createResolver({
      "app*": { class: "stub", name: "broad" },
      "app/admin*": { class: "stub", name: "narrow" },
    });

    expect(resolver.resolve("app/admin/users")).toMatchObject({ name: "broad" });
  });

  it("realizes a descriptor once across repeated resolutions", () => {
    const { resolver, built } = createResolver({
      "*": { class: "stub", name: "catch-all" },
    });

    const first = resolver.resolve("app/cat1");
    const second = resolver.resolve("app/cat1");
    const other = resolver.resolve("app/cat2");

    expect(built).toHaveLength(1);
    expect(second).toBe(first);
    expect(other).toBe(first);
  });

  it("caches the matched category next to the pattern", () => {
    const { resolver } = createResolver({
      "app*": { class: "stub", name: "app" },
      "*": { class: "stub", name: "all" },
    });

    const source = resolver.resolve("app/cat1");

    expect(resolver.patterns()).toEqual(["app*", "*", "app/cat1"]);
    expect(resolver.resolve("app/cat1")).toBe(source);
  });

  it("realizes an exact descriptor in place", () => {
    const { resolver, built } = createResolver({
      common: { class: "stub", name: "common" },
    });

    expect(resolver.resolve("common")).toBe(resolver.resolve("common"));
    expect(built).toHaveLength(1);
    expect(resolver.patterns()).toEqual(["common"]);
  });

  it("shares one instance for a descriptor bound under two patterns", () => {
    const shared = { class: "stub", name: "shared" };
    const { resolver, built } = createResolver({ "app*": shared, "*": shared });

    expect(resolver.resolve("app/cat1")).toBe(resolver.resolve("billing"));
    expect(built).toHaveLength(1);
  });

  it("accepts bindings added after construction", () => {
    const { resolver } = createResolver({});
    const late = new StubSource("late");

    resolver.bind("*", late);

    expect(resolver.resolve("anything")).toBe(late);
  });

  it("propagates descriptor errors", () => {
    const { resolver } = createResolver({
      "*": { class: "" },
      "app*": { class: "missing" },
    });

    expect(() => resolver.resolve("billing")).toThrow(
      'Object configuration must contain a "class" element.',
    );
    expect(() => resolver.resolve("app/x")).toThrow(InvalidDescriptorError);
    expect(() => resolver.resolve("app/x")).toThrow(
      'Unknown message source class "missing"',
    );
  });
});
