import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Any Drizzle Postgres database or transaction. Generic over the driver so the
 * same repositories run on postgres.js in production and PGlite in tests.
 */
export type Database<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> =
  PgDatabase<TQueryResult>;

/**
 * Create a database connection and Drizzle instance.
 *
 * The caller owns the returned client and must `client.end()` it on shutdown.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  const db = drizzle(client);

  return { db, client };
}
