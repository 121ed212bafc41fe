import type { DuckDBConnection } from '@duckdb/node-api';
import { assertIdentifier, type Logger } from '@fastapp/protocol';
import type {
  QueryParam,
  QueryRow,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../interfaces/index.js';
import {
  ConnectionLock,
  quoteIdentifier,
  runDirectly,
  runInTransaction,
  type StatementRunner,
} from './connection.js';
import { translateDuckDbError } from './errors.js';
import {
  DEFAULT_KEY_COLUMN,
  DuckDbRecordRepository,
  type AtomicRunner,
} from './record-repository.js';

export type DuckDbRepositoryContextOptions = {
  /** Create each table the first time it is used */
  createTables?: boolean;
  /** Default key column for every table (default "id") */
  keyColumn?: string;
  /** Receives rollback failures (default console) */
  logger?: Logger;
};

export type DuckDbRecordsOptions = {
  keyColumn?: string;
};

/**
 * Repository context for the analytical backend.
 */
export interface DuckDbRepositoryContext extends TransactionalRepositoryContext {
  records(collection: string, options?: DuckDbRecordsOptions): DuckDbRecordRepository;

  /** Ad-hoc SQL outside any one table */
  query(sql: string, params?: readonly QueryParam[]): Promise<QueryRow[]>;

  tableExists(name: string): Promise<boolean>;

  /** CREATE TABLE IF NOT EXISTS with the record layout */
  ensureTable(name: string, options?: DuckDbRecordsOptions): Promise<void>;
}

type SharedState = {
  connection: DuckDBConnection;
  lock: ConnectionLock;
  createTables: boolean;
  keyColumn: string;
  created: Map<string, Promise<void>>;
  logger: Logger;
};

async function createTable(connection: DuckDBConnection, name: string, keyColumn: string) {
  const table = quoteIdentifier(assertIdentifier(name, 'table'));
  const key = quoteIdentifier(assertIdentifier(keyColumn, 'column'));
  try {
    await connection.run(`CREATE TABLE IF NOT EXISTS ${table} (${key} VARCHAR PRIMARY KEY, data JSON)`);
  } catch (error) {
    throw translateDuckDbError(error, `create table ${name}`);
  }
}

function buildContext(state: SharedState, inTransaction: boolean): DuckDbRepositoryContext {
  const { connection, lock, logger } = state;

  // Inside a transaction the lock is already held. Outside, every statement
  // takes it, so nothing runs on the connection between BEGIN and COMMIT
  // except the transaction's own work.
  const runner: StatementRunner = inTransaction ? runDirectly : (work) => lock.run(work);
  const atomic: AtomicRunner = inTransaction
    ? runDirectly
    : (work) => lock.run(() => runInTransaction(connection, work, logger));

  function ensureTable(name: string, options: DuckDbRecordsOptions = {}): Promise<void> {
    const keyColumn = options.keyColumn ?? state.keyColumn;
    if (inTransaction) {
      return createTable(connection, name, keyColumn);
    }
    let pending = state.created.get(name);
    if (!pending) {
      pending = runner(() => createTable(connection, name, keyColumn)).catch((error: unknown) => {
        state.created.delete(name);
        throw error;
      });
      state.created.set(name, pending);
    }
    return pending;
  }

  return {
    backend: 'duckdb',

    records(collection: string, options: DuckDbRecordsOptions = {}) {
      const keyColumn = options.keyColumn ?? state.keyColumn;
      return new DuckDbRecordRepository(connection, collection, {
        keyColumn,
        atomic,
        runner,
        ready: state.createTables
          ? () => ensureTable(collection, { keyColumn })
          : undefined,
      });
    },

    async query(sql: string, params: readonly QueryParam[] = []): Promise<QueryRow[]> {
      try {
        const reader = await runner(() => connection.runAndReadAll(sql, [...params]));
        return reader.getRowObjectsJson();
      } catch (error) {
        throw translateDuckDbError(error, 'query');
      }
    },

    async tableExists(name: string): Promise<boolean> {
      const table = assertIdentifier(name, 'table');
      try {
        const reader = await runner(() =>
          connection.runAndReadAll(
            'SELECT count(*) > 0 AS present FROM information_schema.tables WHERE table_name = ?',
            [table]
          )
        );
        const [row] = reader.getRowObjects();
        return row?.present === true;
      } catch (error) {
        throw translateDuckDbError(error, `tableExists ${name}`);
      }
    },

    ensureTable,

    /**
     * Run `fn` in one transaction. Transactions on the connection are
     * serialised; repositories from the context passed to `fn` join it.
     * Repositories of the outer context wait until the transaction ends, so
     * awaiting one of them inside `fn` never settles.
     */
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      if (inTransaction) {
        return fn(buildContext(state, true));
      }
      return lock.run(() =>
        runInTransaction(connection, () => fn(buildContext(state, true)), logger)
      );
    },
  };
}

/**
 * Create a DuckDbRepositoryContext over one connection.
 *
 * Usage:
 * ```ts
 * const { connection } = await openDuckDb({ path: 'analytics.duckdb' });
 * const repos = createDuckDbRepositoryContext(connection, { createTables: true });
 * await repos.records('page_views').saveBulk(views);
 * const rows = await repos.query('SELECT count(*) AS n FROM page_views');
 * ```
 */
export function createDuckDbRepositoryContext(
  connection: DuckDBConnection,
  options: DuckDbRepositoryContextOptions = {}
): DuckDbRepositoryContext {
  return buildContext(
    {
      connection,
      lock: new ConnectionLock(),
      createTables: options.createTables ?? false,
      keyColumn: assertIdentifier(options.keyColumn ?? DEFAULT_KEY_COLUMN, 'column'),
      created: new Map(),
      logger: options.logger ?? console,
    },
    false
  );
}
