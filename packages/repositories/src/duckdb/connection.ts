import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import { errorMessage, type Logger } from '@fastapp/protocol';
import { translateDuckDbError } from './errors.js';

export type DuckDbConfig = {
  /** Database file, or ':memory:' (the default) */
  path?: string;
};

export type DuckDb = {
  instance: DuckDBInstance;
  connection: DuckDBConnection;
  /** Disconnect and release the database file */
  close(): void;
};

/**
 * Open a DuckDB database and one connection to it.
 *
 * Usage:
 * ```ts
 * const duck = await openDuckDb({ path: process.env.DUCKDB_PATH });
 * const repos = createDuckDbRepositoryContext(duck.connection, { createTables: true });
 * ```
 */
export async function openDuckDb(config: DuckDbConfig = {}): Promise<DuckDb> {
  const path = config.path ?? ':memory:';
  try {
    const instance = await DuckDBInstance.create(path);
    const connection = await instance.connect();
    return {
      instance,
      connection,
      close() {
        connection.closeSync();
        instance.closeSync();
      },
    };
  } catch (error) {
    throw translateDuckDbError(error, `open ${path}`);
  }
}

/**
 * Serialises async work. DuckDB transactions belong to the connection, so
 * two transactions on one connection must not interleave.
 */
export class ConnectionLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Runs one statement, or one group of statements that must not interleave
 * with others on the connection.
 */
export type StatementRunner = <T>(work: () => Promise<T>) => Promise<T>;

export const runDirectly: StatementRunner = (work) => work();

/** The part of a connection that transaction control needs */
export type SqlConnection = {
  run(sql: string): Promise<unknown>;
};

async function rollbackAfter(connection: SqlConnection, cause: unknown, logger: Logger) {
  try {
    await connection.run('ROLLBACK');
  } catch (rollbackError) {
    logger.error('DuckDB rollback failed', {
      error: errorMessage(rollbackError),
      cause: errorMessage(cause),
    });
  }
}

/**
 * BEGIN, run `work`, COMMIT. When `work` throws, roll back and rethrow its
 * error; a failed ROLLBACK is logged and never replaces it. A failed COMMIT
 * is rolled back and surfaces as a BackendError.
 */
export async function runInTransaction<T>(
  connection: SqlConnection,
  work: () => Promise<T>,
  logger: Logger
): Promise<T> {
  try {
    await connection.run('BEGIN TRANSACTION');
  } catch (error) {
    throw translateDuckDbError(error, 'begin');
  }

  let result: T;
  try {
    result = await work();
  } catch (error) {
    await rollbackAfter(connection, error, logger);
    throw error;
  }

  try {
    await connection.run('COMMIT');
  } catch (error) {
    await rollbackAfter(connection, error, logger);
    throw translateDuckDbError(error, 'commit');
  }
  return result;
}

/**
 * Quote an identifier that has already passed assertIdentifier.
 */
export function quoteIdentifier(name: string): string {
  return `"${name}"`;
}
