import {
  createConsoleI18nEventPublisher,
  createDefaultMessageSourceFactory,
  MessagePipeline,
  type CategoryBindings,
  type I18nEventPublisher,
} from "@msgroute/application";
import {
  createPoolQueryRunner,
  createPostgresPool,
  registerPostgresMessageSource,
} from "@msgroute/infra-postgres";
import {
  CryptoIdGenerator,
  SystemClock,
  type Clock,
  type IdGenerator,
} from "@msgroute/shared";
import type { Pool } from "pg";

import {
  createTranslateHandler,
  type TranslateHandler,
} from "../handlers/translate.js";
import { loadApiConfig, type ApiConfig } from "./config.js";

export interface ApiCompositionRootDeps {
  config?: ApiConfig;
  clock?: Clock;
  idGenerator?: IdGenerator;
  eventPublisher?: I18nEventPublisher;
  translations?: CategoryBindings;
  pipeline?: MessagePipeline;
  postgresPool?: Pool;
}

export interface ApiCompositionRoot {
  pipeline: MessagePipeline;
  handleTranslate: TranslateHandler;
}

function defaultTranslations(config: ApiConfig): CategoryBindings {
  const sourceLanguage = config.sourceLanguage;

  if (config.persistenceDriver === "postgres") {
    return { "*": { class: "postgres", sourceLanguage } };
  }
  if (config.basePath) {
    return {
      "*": { class: "json-file", sourceLanguage, basePath: config.basePath },
    };
  }
  return { "*": { class: "memory", sourceLanguage } };
}

function createPipeline(
  config: ApiConfig,
  deps: ApiCompositionRootDeps,
): MessagePipeline {
  const sourceFactory = createDefaultMessageSourceFactory();

  if (config.persistenceDriver === "postgres") {
    const pool =
      deps.postgresPool ??
      createPostgresPool(
        config.databaseUrl ? { connectionString: config.databaseUrl } : {},
      );
    registerPostgresMessageSource(sourceFactory, createPoolQueryRunner(pool));
  }

  return new MessagePipeline({
    translations: deps.translations ?? defaultTranslations(config),
    sourceFactory,
    eventPublisher: deps.eventPublisher ?? createConsoleI18nEventPublisher(),
    clock: deps.clock ?? new SystemClock(),
  });
}

export function createApiCompositionRoot(
  deps: ApiCompositionRootDeps = {},
): ApiCompositionRoot {
  const config = deps.config ?? loadApiConfig();
  const idGenerator = deps.idGenerator ?? new CryptoIdGenerator("trc_");
  const pipeline = deps.pipeline ?? createPipeline(config, deps);

  return {
    pipeline,
    handleTranslate: createTranslateHandler({ pipeline, idGenerator }),
  };
}
