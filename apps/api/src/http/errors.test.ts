import {
  BadRequestError,
  InvalidDescriptorError,
  NoSourceForCategoryError,
} from "@msgroute/application";
import { afterEach, describe, expect, it, vi } from "vitest";

import { toApiErrorResponse } from "./errors.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("toApiErrorResponse", () => {
  it("maps AppError using status/code/message", () => {
    const response = toApiErrorResponse(new BadRequestError("Invalid payload"));

    expect(response).toEqual({
      status: 400,
      body: { message: "Invalid payload", code: "BAD_REQUEST" },
    });
  });

  it("maps a missing category binding to 404 with details", () => {
    const response = toApiErrorResponse(new NoSourceForCategoryError("billing"));

    expect(response).toEqual({
      status: 404,
      body: {
        message: "Unable to locate message source for category 'billing'.",
        code: "NO_SOURCE_FOR_CATEGORY",
        details: { category: "billing" },
      },
    });
  });

  it("maps descriptor errors to 500", () => {
    const response = toApiErrorResponse(
      new InvalidDescriptorError('Unknown message source class "nope"'),
    );

    expect(response.status).toBe(500);
    expect(response.body.code).toBe("INVALID_DESCRIPTOR");
  });

  it("maps unknown errors to 500 INTERNAL_ERROR and logs them", () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const response = toApiErrorResponse(new Error("boom"), "trace-123");

    expect(response).toEqual({
      status: 500,
      body: {
        message: "Unexpected error",
        code: "INTERNAL_ERROR",
        traceId: "trace-123",
      },
    });
    expect(logged).toHaveBeenCalledWith(
      JSON.stringify({
        type: "api_unhandled_error",
        reason: "boom",
        traceId: "trace-123",
      }),
    );
  });
});
