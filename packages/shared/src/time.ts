import { DateTime, type DateTimeFormatOptions } from "luxon";

export type DateTimeStyle = "short" | "medium" | "long" | "full";
export type DateTimeKind = "date" | "time";

const DATE_PRESETS: Record<DateTimeStyle, DateTimeFormatOptions> = {
  short: DateTime.DATE_SHORT,
  medium: DateTime.DATE_MED,
  long: DateTime.DATE_FULL,
  full: DateTime.DATE_HUGE,
};

const TIME_PRESETS: Record<DateTimeStyle, DateTimeFormatOptions> = {
  short: DateTime.TIME_SIMPLE,
  medium: DateTime.TIME_WITH_SECONDS,
  long: DateTime.TIME_WITH_SHORT_OFFSET,
  full: DateTime.TIME_WITH_LONG_OFFSET,
};

export function utcNowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) {
    throw new Error("Failed to generate current UTC timestamp");
  }
  return iso;
}

export function isDateTimeStyle(value: string): value is DateTimeStyle {
  return Object.hasOwn(DATE_PRESETS, value);
}

/**
 * Accepts the value shapes a message parameter may carry for a date/time
 * argument: `Date`, ISO-8601 string or epoch seconds. Returns null when the
 * value is none of those or does not describe a valid instant.
 */
export function toDateTime(value: unknown, zone: string): DateTime | null {
  let parsed: DateTime;
  if (value instanceof Date) {
    parsed = DateTime.fromJSDate(value, { zone });
  } else if (typeof value === "number") {
    parsed = DateTime.fromSeconds(value, { zone });
  } else if (typeof value === "string") {
    parsed = DateTime.fromISO(value, { zone });
  } else {
    return null;
  }

  return parsed.isValid ? parsed : null;
}

export function formatLocalizedDateTime(
  value: DateTime,
  input: { locale: string; kind: DateTimeKind; style: DateTimeStyle },
): string {
  const presets = input.kind === "date" ? DATE_PRESETS : TIME_PRESETS;
  return value.setLocale(input.locale).toLocaleString(presets[input.style]);
}
