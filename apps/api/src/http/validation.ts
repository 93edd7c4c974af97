import { BadRequestError } from "@msgroute/application";
import { formatZodIssues } from "@msgroute/contracts";
import { type ZodTypeAny } from "zod";

export function parseOrThrowBadRequest<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message = "Invalid request payload",
): TSchema["_output"] {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const details = formatZodIssues(parsed.error.issues);
    throw new BadRequestError(`${message} - ${details}`);
  }

  return parsed.data;
}
