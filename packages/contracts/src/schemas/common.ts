import { z } from "zod";

export const nonEmptyStringSchema = z.string().trim().min(1);

export const languageSchema = nonEmptyStringSchema.regex(
  /^[A-Za-z]{2,3}([-_][A-Za-z0-9]{2,8})*$/,
  "Language must look like en, en-US or en_us",
);

export const categorySchema = nonEmptyStringSchema.refine(
  (category) => !category.split(/[\\/]/).includes(".."),
  "Category must not contain '..' segments",
);

export const sqlIdentifierSchema = nonEmptyStringSchema.regex(
  /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/,
  "Must be a plain or schema-qualified SQL identifier",
);

export const messageParamsSchema = z.union([
  z.record(z.string(), z.unknown()),
  z.array(z.unknown()),
]);

export type MessageParams =
  | Readonly<Record<string, unknown>>
  | ReadonlyArray<unknown>;

export function formatZodIssues(
  issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>,
): string {
  return issues
    .map((issue) => {
      const field =
        issue.path.length > 0
          ? issue.path.map((part) => String(part)).join(".")
          : "payload";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}
