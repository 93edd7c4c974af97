export const DEFAULT_LANGUAGE = "en-US";

const LANGUAGE_SEPARATOR = /[-_]/;

/**
 * Normalizes loose language codes (`en_us`, `EN-us`, `zh_hans_cn`) to the
 * BCP 47 casing `Intl` expects: lowercase language, uppercase two-letter
 * region, title-case four-letter script.
 */
export function normalizeLanguage(input?: string | null): string {
  const trimmed = input?.trim();
  if (!trimmed) return DEFAULT_LANGUAGE;

  const [language = "", ...subtags] = trimmed.split(LANGUAGE_SEPARATOR);

  return [
    language.toLowerCase(),
    ...subtags.map((subtag) => {
      if (subtag.length === 2) return subtag.toUpperCase();
      if (subtag.length === 4) {
        return subtag.charAt(0).toUpperCase() + subtag.slice(1).toLowerCase();
      }
      return subtag.toLowerCase();
    }),
  ].join("-");
}

export function isSameLanguage(left: string, right: string): boolean {
  return normalizeLanguage(left) === normalizeLanguage(right);
}

/**
 * Languages to consult for a catalog, most generic first: `de-DE` yields
 * `["de", "de-DE"]`, `fr` yields `["fr"]`. Codes are kept as given.
 */
export function languageLookupChain(language: string): string[] {
  const [base = language] = language.split(LANGUAGE_SEPARATOR);
  return base === language ? [language] : [base, language];
}

export function firstAcceptedLanguage(header?: string | null): string | null {
  if (!header) return null;

  const first = header
    .split(",")
    .map((part) => part.split(";")[0]?.trim() ?? "")
    .find((tag) => tag.length > 0 && tag !== "*");

  return first ?? null;
}
