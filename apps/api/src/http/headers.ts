import { firstAcceptedLanguage } from "@msgroute/shared";

import type { Headers } from "./types.js";

export function getHeader(headers: Headers, key: string): string | null {
  const value = headers[key.toLowerCase()] ?? headers[key];
  return value ?? null;
}

export function languageFromHeaders(headers: Headers): string | null {
  return firstAcceptedLanguage(getHeader(headers, "accept-language"));
}

export function traceIdFromHeaders(headers: Headers): string | null {
  return getHeader(headers, "x-trace-id")?.trim() || null;
}
