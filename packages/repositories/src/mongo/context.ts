import { randomUUID } from 'node:crypto';
import type { ClientSession, MongoClient } from 'mongodb';
import { assertIdentifier } from '@fastapp/protocol';
import type {
  RecordRepository,
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionHandles,
} from '../interfaces/index.js';
import type { RecordDocument } from './documents.js';
import { translateMongoError } from './errors.js';
import { MongoRecordRepository } from './record-repository.js';
import { SessionRegistry, type SessionDriver } from './sessions.js';

export type MongoRecordsOptions = {
  /** Bind the repository to a transaction opened with prepareTransaction */
  transactionId?: string;
};

/**
 * Repository context for MongoDB with explicit transaction handles.
 */
export interface MongoRepositoryContext
  extends TransactionalRepositoryContext,
    TransactionHandles {
  records(collection: string, options?: MongoRecordsOptions): RecordRepository;

  /** Roll back every transaction still open. Called on shutdown. */
  rollbackOpenTransactions(): Promise<string[]>;
}

function driverFor(client: MongoClient): SessionDriver<ClientSession> {
  return {
    start: () => client.startSession(),
    begin: (session) => session.startTransaction(),
    commit: async (session) => {
      await session.commitTransaction();
    },
    abort: async (session) => {
      await session.abortTransaction();
    },
    end: (session) => session.endSession(),
  };
}

/**
 * Create a MongoRepositoryContext over one database.
 *
 * Document-store transactions need a session threaded through every call, so
 * besides `transaction(fn)` the context exposes explicit handles:
 *
 * ```ts
 * await repos.prepareTransaction('checkout-42');
 * const orders = repos.records('orders', { transactionId: 'checkout-42' });
 * await orders.save({ total: 40 });
 * await repos.commitTransaction('checkout-42');
 * ```
 */
export function createMongoRepositoryContext(
  client: MongoClient,
  dbName: string
): MongoRepositoryContext {
  const db = client.db(dbName);
  const sessions = new SessionRegistry(driverFor(client));

  function records(collection: string, options: MongoRecordsOptions = {}): RecordRepository {
    const name = assertIdentifier(collection, 'collection');
    const { transactionId } = options;
    if (transactionId !== undefined) {
      // Fail fast on an unknown id; re-resolved per call afterwards
      sessions.get(transactionId);
    }
    return new MongoRecordRepository(db.collection<RecordDocument>(name), () =>
      transactionId === undefined ? undefined : sessions.get(transactionId)
    );
  }

  async function prepare(transactionId: string): Promise<void> {
    try {
      await sessions.prepare(transactionId);
    } catch (error) {
      throw translateMongoError(error, `prepare ${transactionId}`);
    }
  }

  async function settle(
    transactionId: string,
    operation: 'commit' | 'rollback'
  ): Promise<boolean> {
    try {
      return operation === 'commit'
        ? await sessions.commit(transactionId)
        : await sessions.rollback(transactionId);
    } catch (error) {
      throw translateMongoError(error, `${operation} ${transactionId}`);
    }
  }

  return {
    backend: 'mongo',
    records,

    prepareTransaction: prepare,

    commitTransaction: (transactionId) => settle(transactionId, 'commit'),

    rollbackTransaction: (transactionId) => settle(transactionId, 'rollback'),

    rollbackOpenTransactions: () => sessions.rollbackAll(),

    /**
     * Run `fn` inside a transaction on a fresh handle.
     * Commits when `fn` resolves; rolls back and rethrows when it throws.
     */
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      const transactionId = randomUUID();
      await prepare(transactionId);

      const txRepos: RepositoryContext = {
        backend: 'mongo',
        records: (collection) => records(collection, { transactionId }),
      };

      let result: T;
      try {
        result = await fn(txRepos);
      } catch (error) {
        await settle(transactionId, 'rollback');
        throw error;
      }
      await settle(transactionId, 'commit');
      return result;
    },
  };
}
