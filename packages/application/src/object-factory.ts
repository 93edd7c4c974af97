import { formatZodIssues, objectDescriptorSchema } from "@msgroute/contracts";
import { z, type ZodTypeAny } from "zod";

import { InvalidDescriptorError } from "./errors.js";

type ObjectBuilder<T> = (fields: Record<string, unknown>) => T;

/**
 * Turns descriptors into instances through builders registered per type tag.
 * Each builder validates its fields against a zod schema before it runs, so
 * builders only ever see a well-typed config.
 */
export class ObjectFactory<T> {
  private readonly builders = new Map<string, ObjectBuilder<T>>();

  constructor(private readonly kind: string) {}

  register<TSchema extends ZodTypeAny>(
    type: string,
    schema: TSchema,
    build: (config: z.output<TSchema>) => T,
  ): this {
    this.builders.set(type, (fields) => {
      const parsed = schema.safeParse(fields);
      if (!parsed.success) {
        throw new InvalidDescriptorError(
          `Invalid ${this.kind} configuration for "${type}" - ${formatZodIssues(
            parsed.error.issues,
          )}`,
          { class: type },
        );
      }
      return build(parsed.data);
    });
    return this;
  }

  has(type: string): boolean {
    return this.builders.has(type);
  }

  create(descriptor: unknown): T {
    const parsed = objectDescriptorSchema.safeParse(
      typeof descriptor === "string" ? { class: descriptor } : descriptor,
    );
    if (!parsed.success) {
      throw new InvalidDescriptorError(
        'Object configuration must contain a "class" element.',
      );
    }

    const { class: type, ...fields } = parsed.data;
    const builder = this.builders.get(type);
    if (!builder) {
      throw new InvalidDescriptorError(`Unknown ${this.kind} class "${type}"`, {
        class: type,
        known: [...this.builders.keys()],
      });
    }

    return builder(fields);
  }
}
