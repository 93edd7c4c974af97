import type { MessagePipeline } from "@msgroute/application";
import {
  translatePayloadSchema,
  type TranslateResult,
} from "@msgroute/contracts";
import { DEFAULT_LANGUAGE, type IdGenerator } from "@msgroute/shared";

import { toApiErrorResponse } from "../http/errors.js";
import { languageFromHeaders, traceIdFromHeaders } from "../http/headers.js";
import type { ApiResponse, Headers } from "../http/types.js";
import { parseOrThrowBadRequest } from "../http/validation.js";

export interface TranslateHandlerDeps {
  pipeline: MessagePipeline;
  idGenerator: IdGenerator;
}

export type TranslateHandler = (
  headers: Headers,
  payload: unknown,
) => Promise<ApiResponse>;

export function createTranslateHandler(
  deps: TranslateHandlerDeps,
): TranslateHandler {
  return async function handleTranslate(
    headers: Headers,
    payload: unknown,
  ): Promise<ApiResponse> {
    const traceId = traceIdFromHeaders(headers) ?? deps.idGenerator.next();

    try {
      const parsedPayload = parseOrThrowBadRequest(
        translatePayloadSchema,
        payload,
        "Invalid translate payload",
      );
      const language =
        parsedPayload.language ?? languageFromHeaders(headers) ?? DEFAULT_LANGUAGE;

      const message = await deps.pipeline.translate(
        parsedPayload.category,
        parsedPayload.message,
        parsedPayload.params,
        language,
      );

      const body: TranslateResult = {
        category: parsedPayload.category,
        language,
        message,
      };
      return { status: 200, body };
    } catch (error) {
      return toApiErrorResponse(error, traceId);
    }
  };
}
