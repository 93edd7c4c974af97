import { describe, expect, it } from "vitest";

import { getHeader, languageFromHeaders, traceIdFromHeaders } from "./headers.js";

describe("header helpers", () => {
  it("reads headers case-insensitively for lowercase keys", () => {
    expect(getHeader({ "accept-language": "fr" }, "Accept-Language")).toBe("fr");
    expect(getHeader({ "X-Trace-Id": "t-1" }, "X-Trace-Id")).toBe("t-1");
    expect(getHeader({}, "x-trace-id")).toBeNull();
  });

  it("derives language and trace id", () => {
    expect(languageFromHeaders({ "accept-language": "pt-BR;q=1, en" })).toBe(
      "pt-BR",
    );
    expect(languageFromHeaders({})).toBeNull();
    expect(traceIdFromHeaders({ "x-trace-id": "  " })).toBeNull();
    expect(traceIdFromHeaders({ "x-trace-id": " t-2 " })).toBe("t-2");
  });
});
