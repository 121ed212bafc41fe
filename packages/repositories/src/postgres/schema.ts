import { sql } from 'drizzle-orm';
import { jsonb, pgTable, text, timestamp, type PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { assertIdentifier, type RecordFields } from '@fastapp/protocol';
import type { Database } from './db.js';

/**
 * Record table - one per collection, created on demand.
 *
 * Fields live in a single jsonb column so any collection shares one shape.
 */
export function recordTable(collection: string) {
  return pgTable(assertIdentifier(collection, 'table'), {
    id: text('id').primaryKey(),
    data: jsonb('data').$type<RecordFields>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  });
}

export type RecordTable = ReturnType<typeof recordTable>;

/**
 * CREATE TABLE IF NOT EXISTS for a record table.
 */
export async function ensureRecordTable<TQueryResult extends PgQueryResultHKT>(
  db: Database<TQueryResult>,
  collection: string
): Promise<void> {
  const name = assertIdentifier(collection, 'table');
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ${sql.identifier(name)} (
      id text PRIMARY KEY,
      data jsonb NOT NULL DEFAULT '{}'::jsonb,
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}
