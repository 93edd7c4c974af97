import { z } from "zod";

import {
  categorySchema,
  languageSchema,
  messageParamsSchema,
} from "./common.js";

export const translatePayloadSchema = z
  .object({
    category: categorySchema,
    message: z.string(),
    params: messageParamsSchema.optional(),
    language: languageSchema.optional(),
  })
  .strict();

export type TranslatePayload = z.infer<typeof translatePayloadSchema>;

export interface TranslateResult {
  category: string;
  language: string;
  message: string;
}
