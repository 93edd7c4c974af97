import type { ObjectDescriptor } from "@msgroute/contracts";
import { CATCH_ALL_PATTERN, findPrefixWildcardMatch } from "@msgroute/domain";

import { NoSourceForCategoryError } from "./errors.js";
import { isMessageSource, type MessageSource } from "./message-source.js";
import type { ObjectFactory } from "./object-factory.js";

export type CategoryBinding = MessageSource | ObjectDescriptor;

export type CategoryBindings = Readonly<Record<string, CategoryBinding>>;

/**
 * Maps categories to message sources: exact name first, then the first
 * registered `prefix*` pattern, then `*`. Descriptors are realized on first
 * use and the instance is written back under the matched pattern and the
 * requested category, so repeat lookups are a single map hit.
 */
export class CategoryResolver {
  private readonly registry: Map<string, CategoryBinding>;
  private readonly realized = new Map<ObjectDescriptor, MessageSource>();

  constructor(
    bindings: CategoryBindings,
    private readonly sourceFactory: ObjectFactory<MessageSource>,
  ) {
    this.registry = new Map(Object.entries(bindings));
  }

  bind(pattern: string, binding: CategoryBinding): void {
    this.registry.set(pattern, binding);
  }

  patterns(): string[] {
    return [...this.registry.keys()];
  }

  resolve(category: string): MessageSource {
    const exact = this.registry.get(category);
    if (exact !== undefined) {
      return this.realize(exact, [category]);
    }

    const pattern =
      findPrefixWildcardMatch(this.registry.keys(), category) ??
      (this.registry.has(CATCH_ALL_PATTERN) ? CATCH_ALL_PATTERN : null);
    const binding = pattern === null ? undefined : this.registry.get(pattern);
    if (pattern === null || binding === undefined) {
      throw new NoSourceForCategoryError(category);
    }

    return this.realize(binding, [pattern, category]);
  }

  private realize(binding: CategoryBinding, keys: string[]): MessageSource {
    const source = isMessageSource(binding)
      ? binding
      : this.realizeDescriptor(binding);

    for (const key of keys) {
      this.registry.set(key, source);
    }
    return source;
  }

  private realizeDescriptor(descriptor: ObjectDescriptor): MessageSource {
    const cached = this.realized.get(descriptor);
    if (cached) return cached;

    const source = this.sourceFactory.create(descriptor);
    this.realized.set(descriptor, source);
    return source;
  }
}
