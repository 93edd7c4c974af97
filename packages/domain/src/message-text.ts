import type { MessageParams } from "@msgroute/contracts";

const ICU_ARGUMENT_REGEX = /\{\s*[\p{L}\p{N}_]+\s*,/u;
const PLACEHOLDER_REGEX = /\{([^{}]*)\}/g;

function isParamList(
  params: MessageParams,
): params is ReadonlyArray<unknown> {
  return Array.isArray(params);
}

export function normalizeMessageParams(
  params: MessageParams | null | undefined,
): Record<string, unknown> {
  if (!params) return {};

  if (isParamList(params)) {
    return Object.fromEntries(
      params.map((value, index) => [String(index), value]),
    );
  }

  return { ...params };
}

/** Cheap gate: `{name,` somewhere in the text means ICU argument syntax. */
export function hasIcuSyntax(message: string): boolean {
  return ICU_ARGUMENT_REGEX.test(message);
}

export function stringifyParam(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function substitutePlaceholders(
  message: string,
  params: Readonly<Record<string, unknown>>,
): string {
  return message.replace(PLACEHOLDER_REGEX, (placeholder, name: string) =>
    Object.hasOwn(params, name) ? stringifyParam(params[name]) : placeholder,
  );
}
