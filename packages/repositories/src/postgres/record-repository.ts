import { asc, eq, gt, inArray, sql } from 'drizzle-orm';
import type { PgQueryResultHKT } from 'drizzle-orm/pg-core';
import {
  assertRecordId,
  type EntityRecord,
  type NewRecord,
  type RecordFields,
  type RecordId,
  type RecordUpdates,
} from '@fastapp/protocol';
import type { RecordRepository, StreamOptions } from '../interfaces/index.js';
import {
  chunk,
  joinRecord,
  lastWins,
  normalizeUpdates,
  resolveBatchSize,
  splitRecord,
  uniqueIds,
} from '../records.js';
import type { Database } from './db.js';
import { translatePgError } from './errors.js';
import { recordTable, type RecordTable } from './schema.js';

// Keeps every statement well under the 65535 bind-parameter limit
const MAX_ROWS_PER_STATEMENT = 1000;

/**
 * RecordRepository over one Postgres table of `(id, data jsonb)` rows.
 */
export class PgRecordRepository<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT>
  implements RecordRepository
{
  readonly collection: string;
  private readonly table: RecordTable;

  /**
   * @param ready - Resolves once the table exists; awaited before every statement
   */
  constructor(
    private readonly db: Database<TQueryResult>,
    collection: string,
    private readonly ready: () => Promise<void> = () => Promise.resolve()
  ) {
    this.table = recordTable(collection);
    this.collection = collection;
  }

  private async run<T>(operation: string, statement: () => Promise<T>): Promise<T> {
    try {
      await this.ready();
      return await statement();
    } catch (error) {
      throw translatePgError(error, `${operation} on ${this.collection}`);
    }
  }

  async get(id: RecordId): Promise<EntityRecord | null> {
    const key = assertRecordId(id);
    const [row] = await this.run('get', () =>
      this.db
        .select({ id: this.table.id, data: this.table.data })
        .from(this.table)
        .where(eq(this.table.id, key))
    );
    return row ? joinRecord(row.id, row.data) : null;
  }

  async getBulk(ids: readonly RecordId[]): Promise<Map<RecordId, EntityRecord>> {
    const keys = uniqueIds(ids);
    const found = new Map<RecordId, EntityRecord>();

    for (const slice of chunk(keys, MAX_ROWS_PER_STATEMENT)) {
      const rows = await this.run('getBulk', () =>
        this.db
          .select({ id: this.table.id, data: this.table.data })
          .from(this.table)
          .where(inArray(this.table.id, slice))
      );
      for (const row of rows) {
        found.set(row.id, joinRecord(row.id, row.data));
      }
    }

    return found;
  }

  async save(entity: NewRecord): Promise<EntityRecord> {
    const [saved] = await this.saveBulk([entity]);
    return saved;
  }

  async saveBulk(entities: readonly NewRecord[]): Promise<EntityRecord[]> {
    const records = entities.map(splitRecord);
    const stored = new Map<RecordId, RecordFields>();

    for (const slice of chunk(lastWins(records), MAX_ROWS_PER_STATEMENT)) {
      const rows = await this.run('saveBulk', () =>
        this.db
          .insert(this.table)
          .values(slice.map(({ id, fields }) => ({ id, data: fields })))
          .onConflictDoUpdate({
            target: this.table.id,
            set: { data: sql`excluded.data`, updatedAt: new Date() },
          })
          .returning({ id: this.table.id, data: this.table.data })
      );
      for (const row of rows) {
        stored.set(row.id, row.data);
      }
    }

    return records.map(({ id, fields }) => joinRecord(id, stored.get(id) ?? fields));
  }

  async delete(id: RecordId): Promise<boolean> {
    const key = assertRecordId(id);
    const rows = await this.run('delete', () =>
      this.db.delete(this.table).where(eq(this.table.id, key)).returning({ id: this.table.id })
    );
    return rows.length > 0;
  }

  async deleteBulk(ids: readonly RecordId[]): Promise<number> {
    let removed = 0;
    for (const slice of chunk(uniqueIds(ids), MAX_ROWS_PER_STATEMENT)) {
      const rows = await this.run('deleteBulk', () =>
        this.db
          .delete(this.table)
          .where(inArray(this.table.id, slice))
          .returning({ id: this.table.id })
      );
      removed += rows.length;
    }
    return removed;
  }

  /**
   * One `data = data || patch` statement per id, all inside one transaction.
   */
  async updateBulk(updates: RecordUpdates): Promise<number> {
    const entries = normalizeUpdates(updates);
    if (entries.length === 0) {
      return 0;
    }

    return this.run('updateBulk', () =>
      this.db.transaction(async (tx) => {
        let updated = 0;
        for (const { id, fields } of entries) {
          const rows = await tx
            .update(this.table)
            .set({
              data: sql`${this.table.data} || ${JSON.stringify(fields)}::jsonb`,
              updatedAt: new Date(),
            })
            .where(eq(this.table.id, id))
            .returning({ id: this.table.id });
          updated += rows.length;
        }
        return updated;
      })
    );
  }

  /**
   * Keyset pagination on id: no server-side cursor stays open between batches.
   */
  async *streamAll(options: StreamOptions = {}): AsyncGenerator<EntityRecord> {
    const batchSize = resolveBatchSize(options.batchSize);
    let after: RecordId | null = null;

    while (true) {
      options.signal?.throwIfAborted();

      const cursor: RecordId | null = after;
      const rows: { id: RecordId; data: RecordFields }[] = await this.run('streamAll', () =>
        this.db
          .select({ id: this.table.id, data: this.table.data })
          .from(this.table)
          .where(cursor === null ? undefined : gt(this.table.id, cursor))
          .orderBy(asc(this.table.id))
          .limit(batchSize)
      );

      for (const row of rows) {
        yield joinRecord(row.id, row.data);
      }

      if (rows.length < batchSize) {
        return;
      }
      after = rows[rows.length - 1].id;
    }
  }
}
