import type { PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../interfaces/index.js';
import type { Database } from './db.js';
import { translatePgError } from './errors.js';
import { PgRecordRepository } from './record-repository.js';
import { ensureRecordTable } from './schema.js';

export type PgRepositoryContextOptions = {
  /**
   * Create each collection's table the first time it is used.
   * Off by default: production schemas are expected to exist already.
   */
  createTables?: boolean;
};

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db, { createTables: true });
 *
 * // Execute multiple operations atomically
 * await repos.transaction(async (txRepos) => {
 *   await txRepos.records('orders').save({ total: 40 });
 *   await txRepos.records('payments').save({ amount: 40 });
 * });
 * ```
 */
export function createPgRepositoryContext<TQueryResult extends PgQueryResultHKT>(
  db: Database<TQueryResult>,
  options: PgRepositoryContextOptions = {}
): TransactionalRepositoryContext {
  return new PgRepositoryContext(db, options.createTables ?? false, new Map(), false);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * Repositories are cheap: each `records()` call binds a table definition to
 * the context's database or transaction handle.
 */
class PgRepositoryContext<TQueryResult extends PgQueryResultHKT>
  implements TransactionalRepositoryContext
{
  readonly backend = 'postgres';

  constructor(
    private readonly db: Database<TQueryResult>,
    private readonly createTables: boolean,
    private readonly created: Map<string, Promise<void>>,
    private readonly inTransaction: boolean
  ) {}

  records(collection: string): PgRecordRepository<TQueryResult> {
    return new PgRecordRepository(this.db, collection, () => this.ensureTable(collection));
  }

  private ensureTable(collection: string): Promise<void> {
    if (!this.createTables) {
      return Promise.resolve();
    }
    // A table created inside a transaction disappears on rollback, so only
    // creations outside one are remembered.
    if (this.inTransaction) {
      return ensureRecordTable(this.db, collection);
    }

    let pending = this.created.get(collection);
    if (!pending) {
      pending = ensureRecordTable(this.db, collection).catch((error: unknown) => {
        this.created.delete(collection);
        throw error;
      });
      this.created.set(collection, pending);
    }
    return pending;
  }

  /**
   * Execute a function within a database transaction.
   *
   * All repository operations made through the context passed to `fn` are atomic:
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    const thrownByFn = new Set<unknown>();

    try {
      return await this.db.transaction(async (tx) => {
        const txRepos: RepositoryContext = new PgRepositoryContext(
          tx,
          this.createTables,
          this.created,
          true
        );
        try {
          return await fn(txRepos);
        } catch (error) {
          thrownByFn.add(error);
          throw error;
        }
      });
    } catch (error) {
      // Errors thrown by fn reach the caller untouched
      if (thrownByFn.has(error)) {
        throw error;
      }
      throw translatePgError(error, 'transaction');
    }
  }
}
