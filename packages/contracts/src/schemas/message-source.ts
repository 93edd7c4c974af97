import { z } from "zod";

import {
  languageSchema,
  nonEmptyStringSchema,
  sqlIdentifierSchema,
} from "./common.js";

const messageMapSchema = z.record(z.string(), z.string());

export const messageCatalogFileSchema = messageMapSchema;

export type MessageCatalog = Record<string, string>;

const baseMessageSourceConfigSchema = z.object({
  sourceLanguage: languageSchema.default("en-US"),
  forceTranslation: z.boolean().default(false),
  maxCachedCatalogs: z.number().int().positive().default(1000),
});

export const inMemoryMessageSourceConfigSchema =
  baseMessageSourceConfigSchema
    .extend({
      // language -> category -> message -> translation
      messages: z
        .record(z.string(), z.record(z.string(), messageMapSchema))
        .default({}),
    })
    .strict();

export type InMemoryMessageSourceConfig = z.infer<
  typeof inMemoryMessageSourceConfigSchema
>;

export const jsonFileMessageSourceConfigSchema = baseMessageSourceConfigSchema
  .extend({
    basePath: nonEmptyStringSchema,
    fileMap: z.record(z.string(), nonEmptyStringSchema).default({}),
  })
  .strict();

export type JsonFileMessageSourceConfig = z.infer<
  typeof jsonFileMessageSourceConfigSchema
>;

export const postgresMessageSourceConfigSchema = baseMessageSourceConfigSchema
  .extend({
    sourceMessageTable: sqlIdentifierSchema.default("source_message"),
    messageTable: sqlIdentifierSchema.default("message"),
  })
  .strict();

export type PostgresMessageSourceConfig = z.infer<
  typeof postgresMessageSourceConfigSchema
>;

export const icuFormatterConfigSchema = z
  .object({
    timeZone: nonEmptyStringSchema.default("utc"),
    maxCachedPatterns: z.number().int().positive().default(500),
  })
  .strict();

export type IcuFormatterConfig = z.infer<typeof icuFormatterConfigSchema>;
