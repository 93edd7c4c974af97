import { z } from "zod";

import { nonEmptyStringSchema } from "./common.js";

/**
 * Inert configuration naming a capability by its type tag (`class`) plus the
 * fields its builder consumes. A bare string is shorthand for `{ class }`.
 */
export const objectDescriptorSchema = z
  .object({
    class: nonEmptyStringSchema,
  })
  .passthrough();

export type ObjectDescriptorObject = {
  class: string;
  [field: string]: unknown;
};

export type ObjectDescriptor = string | ObjectDescriptorObject;
