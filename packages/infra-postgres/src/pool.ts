import { Pool } from "pg";

export interface PostgresConfig {
  connectionString: string;
  max?: number;
  applicationName?: string;
}

export function requireDatabaseUrl(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env.DATABASE_URL?.trim();
  if (!value) {
    throw new Error("DATABASE_URL is required for postgres message sources");
  }
  return value;
}

export function createPostgresPool(config?: Partial<PostgresConfig>): Pool {
  return new Pool({
    connectionString: config?.connectionString ?? requireDatabaseUrl(),
    max: config?.max ?? 5,
    application_name: config?.applicationName ?? "msgroute",
  });
}
