import type { BackendKind } from '@fastapp/protocol';
import type { RecordRepository } from './record-repository.js';

/**
 * RepositoryContext hands out record repositories for one backend.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, MongoDB, DuckDB, in-memory)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const courses = repos.records('courses');
 * await courses.save({ title: 'Intro' });
 * ```
 */
export interface RepositoryContext {
  readonly backend: BackendKind;

  /**
   * Repository for one table or collection.
   * @throws ValidationError if the name is not a safe identifier
   */
  records(collection: string): RecordRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 * Implementations that support transactions should implement this interface.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations made through the context passed to `fn` are atomic.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}

/**
 * Explicit transaction handles, for stores whose transactions need a session
 * threaded through every call rather than an ambient scope.
 *
 * Handles are disjoint by id. Using one id from two concurrent callers is the
 * caller's problem: finish with commit or rollback before reusing it.
 */
export interface TransactionHandles {
  /**
   * Begin a transaction under the given id.
   * @throws ValidationError if the id is already open
   */
  prepareTransaction(transactionId: string): Promise<void>;

  /** @returns false if no transaction is open under the id */
  commitTransaction(transactionId: string): Promise<boolean>;

  /** @returns false if no transaction is open under the id */
  rollbackTransaction(transactionId: string): Promise<boolean>;
}
