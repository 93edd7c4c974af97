import {
  BaseMessageSource,
  type BaseMessageSourceOptions,
  type MessageSource,
  type ObjectFactory,
} from "@msgroute/application";
import {
  postgresMessageSourceConfigSchema,
  type MessageCatalog,
} from "@msgroute/contracts";
import type { Pool } from "pg";

export type TranslationRow = {
  message: string;
  translation: string | null;
};

export type TranslationQueryRunner = (
  text: string,
  values: string[],
) => Promise<TranslationRow[]>;

export function createPoolQueryRunner(pool: Pool): TranslationQueryRunner {
  return async (text, values) => {
    const result = await pool.query<TranslationRow>(text, values);
    return result.rows;
  };
}

export interface PostgresMessageSourceOptions extends BaseMessageSourceOptions {
  runQuery: TranslationQueryRunner;
  sourceMessageTable?: string;
  messageTable?: string;
}

/**
 * Catalogs stored as `source_message(id, category, message)` plus
 * `message(id, language, translation)`; one query per category and language.
 * Table names must already be validated identifiers.
 */
export class PostgresMessageSource extends BaseMessageSource {
  private readonly runQuery: TranslationQueryRunner;
  private readonly sourceMessageTable: string;
  private readonly messageTable: string;

  constructor(options: PostgresMessageSourceOptions) {
    super(options);
    this.runQuery = options.runQuery;
    this.sourceMessageTable = options.sourceMessageTable ?? "source_message";
    this.messageTable = options.messageTable ?? "message";
  }

  protected async loadMessages(
    category: string,
    language: string,
  ): Promise<MessageCatalog> {
    const rows = await this.runQuery(
      `SELECT s.message AS message, m.translation AS translation
         FROM ${this.sourceMessageTable} s
        INNER JOIN ${this.messageTable} m ON s.id = m.id
        WHERE s.category = $1
          AND m.language = $2`,
      [category, language],
    );

    const catalog: MessageCatalog = {};
    for (const row of rows) {
      if (row.translation !== null) catalog[row.message] = row.translation;
    }
    return catalog;
  }
}

export function registerPostgresMessageSource(
  factory: ObjectFactory<MessageSource>,
  runQuery: TranslationQueryRunner,
): ObjectFactory<MessageSource> {
  return factory.register(
    "postgres",
    postgresMessageSourceConfigSchema,
    (config) => new PostgresMessageSource({ ...config, runQuery }),
  );
}
