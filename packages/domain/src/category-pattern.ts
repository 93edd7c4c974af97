export const CATCH_ALL_PATTERN = "*";

export type CategoryPattern =
  | { kind: "exact"; category: string }
  | { kind: "prefix"; prefix: string }
  | { kind: "catch-all" };

/**
 * `*` alone is the catch-all; `prefix*` (a `*` anywhere after the first
 * character) matches every category starting with the text before the
 * trailing stars. Anything else only ever matches itself.
 */
export function classifyCategoryPattern(pattern: string): CategoryPattern {
  if (pattern === CATCH_ALL_PATTERN) return { kind: "catch-all" };

  if (pattern.indexOf("*") > 0) {
    return { kind: "prefix", prefix: pattern.replace(/\*+$/, "") };
  }

  return { kind: "exact", category: pattern };
}

/**
 * First prefix pattern, in iteration order, whose prefix starts `category`.
 * Later or longer prefixes never win over an earlier match.
 */
export function findPrefixWildcardMatch(
  patterns: Iterable<string>,
  category: string,
): string | null {
  for (const pattern of patterns) {
    const classified = classifyCategoryPattern(pattern);
    if (
      classified.kind === "prefix" &&
      category.startsWith(classified.prefix)
    ) {
      return pattern;
    }
  }

  return null;
}
