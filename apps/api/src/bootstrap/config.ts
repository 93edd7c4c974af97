import {
  formatZodIssues,
  languageSchema,
  nonEmptyStringSchema,
} from "@msgroute/contracts";
import { z } from "zod";

const apiConfigSchema = z
  .object({
    I18N_SOURCE_LANGUAGE: languageSchema.default("en-US"),
    I18N_BASE_PATH: nonEmptyStringSchema.optional(),
    PERSISTENCE_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: nonEmptyStringSchema.optional(),
  })
  .refine(
    (env) => env.PERSISTENCE_DRIVER !== "postgres" || Boolean(env.DATABASE_URL),
    {
      message: "DATABASE_URL is required when PERSISTENCE_DRIVER is postgres",
      path: ["DATABASE_URL"],
    },
  );

export type PersistenceDriver = "memory" | "postgres";

export interface ApiConfig {
  sourceLanguage: string;
  basePath: string | null;
  persistenceDriver: PersistenceDriver;
  databaseUrl: string | null;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = apiConfigSchema.safeParse({
    I18N_SOURCE_LANGUAGE: blankToUndefined(env.I18N_SOURCE_LANGUAGE),
    I18N_BASE_PATH: blankToUndefined(env.I18N_BASE_PATH),
    PERSISTENCE_DRIVER: blankToUndefined(env.PERSISTENCE_DRIVER),
    DATABASE_URL: blankToUndefined(env.DATABASE_URL),
  });

  if (!parsed.success) {
    throw new Error(
      `Invalid API configuration - ${formatZodIssues(parsed.error.issues)}`,
    );
  }

  return {
    sourceLanguage: parsed.data.I18N_SOURCE_LANGUAGE,
    basePath: parsed.data.I18N_BASE_PATH ?? null,
    persistenceDriver: parsed.data.PERSISTENCE_DRIVER,
    databaseUrl: parsed.data.DATABASE_URL ?? null,
  };
}
