import type { DuckDBConnection, DuckDBValue } from '@duckdb/node-api';
import {
  assertIdentifier,
  assertRecordId,
  type EntityRecord,
  type NewRecord,
  type RecordFields,
  type RecordId,
  type RecordUpdates,
} from '@fastapp/protocol';
import type {
  AnalyticalRecordRepository,
  QueryParam,
  QueryRow,
  StreamOptions,
} from '../interfaces/index.js';
import {
  chunk,
  joinRecord,
  lastWins,
  normalizeUpdates,
  resolveBatchSize,
  splitRecord,
  uniqueIds,
} from '../records.js';
import { quoteIdentifier, runDirectly, type StatementRunner } from './connection.js';
import { translateDuckDbError } from './errors.js';

export const DEFAULT_KEY_COLUMN = 'id';

const MAX_ROWS_PER_STATEMENT = 1000;

/**
 * Runs work atomically: in a fresh transaction, or in the caller's when one is open.
 */
export type AtomicRunner = <T>(work: () => Promise<T>) => Promise<T>;

export type DuckDbRecordRepositoryOptions = {
  /** Primary key column (default "id") */
  keyColumn?: string;
  /** Resolves once the table exists; awaited before every statement */
  ready?: () => Promise<void>;
  atomic?: AtomicRunner;
  /** Wraps every single statement; a shared connection passes its lock here */
  runner?: StatementRunner;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON column read as VARCHAR. Anything but an object reads as no fields.
 */
export function parseFields(value: DuckDBValue | undefined): RecordFields {
  if (typeof value !== 'string') {
    return {};
  }
  const parsed: unknown = JSON.parse(value);
  return isPlainObject(parsed) ? parsed : {};
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

/**
 * RecordRepository over one DuckDB table of `(<key> VARCHAR PRIMARY KEY, data JSON)`.
 *
 * Read-mostly: meant for analytics jobs that load records in bulk and then
 * aggregate them with `query`.
 */
export class DuckDbRecordRepository implements AnalyticalRecordRepository {
  readonly collection: string;
  readonly keyColumn: string;
  private readonly table: string;
  private readonly key: string;
  private readonly ready: () => Promise<void>;
  private readonly atomic: AtomicRunner;
  private readonly runner: StatementRunner;

  constructor(
    private readonly connection: DuckDBConnection,
    collection: string,
    options: DuckDbRecordRepositoryOptions = {}
  ) {
    this.collection = assertIdentifier(collection, 'table');
    this.keyColumn = assertIdentifier(options.keyColumn ?? DEFAULT_KEY_COLUMN, 'column');
    this.table = quoteIdentifier(this.collection);
    this.key = quoteIdentifier(this.keyColumn);
    this.ready = options.ready ?? (() => Promise.resolve());
    this.atomic = options.atomic ?? runDirectly;
    this.runner = options.runner ?? runDirectly;
  }

  /**
   * `ready` is awaited outside the runner, which may itself take the lock.
   * Statements issued from inside `atomic` pass `locked: false`: the
   * transaction already holds the connection.
   */
  private async statement<T>(operation: string, work: () => Promise<T>, locked: boolean): Promise<T> {
    try {
      await this.ready();
      return await (locked ? this.runner(work) : work());
    } catch (error) {
      throw translateDuckDbError(error, `${operation} on ${this.collection}`);
    }
  }

  private rows(
    operation: string,
    sql: string,
    values: DuckDBValue[] = [],
    locked = true
  ): Promise<Record<string, DuckDBValue>[]> {
    return this.statement(
      operation,
      async () => (await this.connection.runAndReadAll(sql, values)).getRowObjects(),
      locked
    );
  }

  private execute(
    operation: string,
    sql: string,
    values: DuckDBValue[] = [],
    locked = true
  ): Promise<number> {
    return this.statement(
      operation,
      async () => Number((await this.connection.run(sql, values)).rowsChanged),
      locked
    );
  }

  private selectRecords(where: string): string {
    return `SELECT CAST(${this.key} AS VARCHAR) AS id, CAST(data AS VARCHAR) AS data FROM ${this.table} ${where}`;
  }

  private toRecord(row: Record<string, DuckDBValue>): EntityRecord {
    return joinRecord(String(row.id), parseFields(row.data));
  }

  private async fetch(
    operation: string,
    ids: RecordId[],
    locked = true
  ): Promise<Map<RecordId, EntityRecord>> {
    const found = new Map<RecordId, EntityRecord>();
    for (const slice of chunk(ids, MAX_ROWS_PER_STATEMENT)) {
      const rows = await this.rows(
        operation,
        this.selectRecords(`WHERE ${this.key} IN (${placeholders(slice.length)})`),
        slice,
        locked
      );
      for (const row of rows) {
        const record = this.toRecord(row);
        found.set(record.id, record);
      }
    }
    return found;
  }

  async get(id: RecordId): Promise<EntityRecord | null> {
    const key = assertRecordId(id);
    const [row] = await this.rows('get', this.selectRecords(`WHERE ${this.key} = ?`), [key]);
    return row ? this.toRecord(row) : null;
  }

  async getBulk(ids: readonly RecordId[]): Promise<Map<RecordId, EntityRecord>> {
    return this.fetch('getBulk', uniqueIds(ids));
  }

  async save(entity: NewRecord): Promise<EntityRecord> {
    const [saved] = await this.saveBulk([entity]);
    return saved;
  }

  /**
   * One multi-row `INSERT … ON CONFLICT DO UPDATE` per slice. Repeated ids are
   * collapsed first: DuckDB refuses to update one row twice in a statement.
   */
  async saveBulk(entities: readonly NewRecord[]): Promise<EntityRecord[]> {
    const records = entities.map(splitRecord);
    const stored = new Map<RecordId, string>();
    for (const { id, fields } of lastWins(records)) {
      stored.set(id, JSON.stringify(fields));
    }

    for (const slice of chunk(Array.from(stored), MAX_ROWS_PER_STATEMENT)) {
      await this.execute(
        'saveBulk',
        `INSERT INTO ${this.table} (${this.key}, data) VALUES ${slice.map(() => '(?, ?)').join(', ')} ` +
          `ON CONFLICT (${this.key}) DO UPDATE SET data = excluded.data`,
        slice.flat()
      );
    }

    return records.map(({ id }) => joinRecord(id, parseFields(stored.get(id))));
  }

  async delete(id: RecordId): Promise<boolean> {
    const key = assertRecordId(id);
    const removed = await this.execute('delete', `DELETE FROM ${this.table} WHERE ${this.key} = ?`, [
      key,
    ]);
    return removed > 0;
  }

  async deleteBulk(ids: readonly RecordId[]): Promise<number> {
    let removed = 0;
    for (const slice of chunk(uniqueIds(ids), MAX_ROWS_PER_STATEMENT)) {
      removed += await this.execute(
        'deleteBulk',
        `DELETE FROM ${this.table} WHERE ${this.key} IN (${placeholders(slice.length)})`,
        slice
      );
    }
    return removed;
  }

  /**
   * Read, merge top-level fields, write back: all inside one transaction.
   * (json_merge_patch would merge nested objects too.)
   */
  async updateBulk(updates: RecordUpdates): Promise<number> {
    const entries = normalizeUpdates(updates);
    if (entries.length === 0) {
      return 0;
    }

    // Table creation stays outside the transaction
    await this.ready();
    return this.atomic(async () => {
      const existing = await this.fetch(
        'updateBulk',
        uniqueIds(entries.map(({ id }) => id)),
        false
      );

      let updated = 0;
      for (const { id, fields } of entries) {
        const current = existing.get(id);
        if (!current) {
          continue;
        }
        const { id: _key, ...stored } = current;
        const merged = { ...stored, ...fields };
        existing.set(id, joinRecord(id, merged));
        await this.execute(
          'updateBulk',
          `UPDATE ${this.table} SET data = ? WHERE ${this.key} = ?`,
          [JSON.stringify(merged), id],
          false
        );
        updated++;
      }
      return updated;
    });
  }

  /**
   * Keyset pagination on the key column; each batch is its own query.
   */
  async *streamAll(options: StreamOptions = {}): AsyncGenerator<EntityRecord> {
    const batchSize = resolveBatchSize(options.batchSize);
    let after: RecordId | null = null;

    while (true) {
      options.signal?.throwIfAborted();

      const cursor: RecordId | null = after;
      const rows: Record<string, DuckDBValue>[] =
        cursor === null
          ? await this.rows(
              'streamAll',
              this.selectRecords(`ORDER BY ${this.key} LIMIT ${batchSize}`)
            )
          : await this.rows(
              'streamAll',
              this.selectRecords(`WHERE ${this.key} > ? ORDER BY ${this.key} LIMIT ${batchSize}`),
              [cursor]
            );

      const records = rows.map((row) => this.toRecord(row));
      for (const record of records) {
        yield record;
      }

      if (records.length < batchSize) {
        return;
      }
      after = records[records.length - 1].id;
    }
  }

  /**
   * Ad-hoc SQL with positional `?` parameters. Rows come back as plain JSON
   * values (BIGINT and DECIMAL as strings, dates as ISO strings).
   */
  async query(sql: string, params: readonly QueryParam[] = []): Promise<QueryRow[]> {
    return this.statement(
      'query',
      async () => (await this.connection.runAndReadAll(sql, [...params])).getRowObjectsJson(),
      true
    );
  }
}
