import { AppError } from "@msgroute/application";
import {
  buildStandardErrorBody,
  describeError,
  type StandardErrorBody,
} from "@msgroute/shared";

import type { ApiResponse } from "./types.js";

export function toApiErrorResponse(
  error: unknown,
  traceId?: string,
): ApiResponse<StandardErrorBody> {
  if (error instanceof AppError) {
    return {
      status: error.httpStatus,
      body: buildStandardErrorBody({
        message: error.message,
        code: error.code,
        details: error.details,
        traceId,
      }),
    };
  }

  console.error(
    JSON.stringify({
      type: "api_unhandled_error",
      reason: describeError(error),
      ...(traceId ? { traceId } : {}),
    }),
  );

  return {
    status: 500,
    body: buildStandardErrorBody({
      message: "Unexpected error",
      code: "INTERNAL_ERROR",
      traceId,
    }),
  };
}
