// In-memory repository implementation for development and testing
//
// Useful for:
// - Local development without a database
// - Fast unit testing
// - The single-process default backend
//
// Data does not persist between restarts. Records are cloned on the way in
// and on the way out, so callers never share state with the store.

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
  RecordRepository,
  RepositoryContext,
  StreamOptions,
  TransactionalRepositoryContext,
} from '../interfaces/index.js';
import {
  joinRecord,
  lastWins,
  normalizeUpdates,
  resolveBatchSize,
  splitRecord,
  uniqueIds,
} from '../records.js';

/**
 * Collection name -> id -> stored fields.
 */
export type InMemoryDataStore = Map<string, Map<RecordId, RecordFields>>;

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function cloneStore(store: InMemoryDataStore): InMemoryDataStore {
  return new Map(
    Array.from(store, ([collection, records]) => [collection, structuredClone(records)])
  );
}

/**
 * RecordRepository over one in-memory table.
 */
export class InMemoryRecordRepository implements RecordRepository {
  readonly collection: string;

  constructor(
    private readonly store: InMemoryDataStore,
    collection: string
  ) {
    this.collection = assertIdentifier(collection, 'collection');
  }

  private get table(): Map<RecordId, RecordFields> {
    let table = this.store.get(this.collection);
    if (!table) {
      table = new Map();
      this.store.set(this.collection, table);
    }
    return table;
  }

  private read(id: RecordId): EntityRecord | null {
    const fields = this.table.get(id);
    return fields ? joinRecord(id, structuredClone(fields)) : null;
  }

  async get(id: RecordId): Promise<EntityRecord | null> {
    return this.read(assertRecordId(id));
  }

  async getBulk(ids: readonly RecordId[]): Promise<Map<RecordId, EntityRecord>> {
    const found = new Map<RecordId, EntityRecord>();
    for (const id of uniqueIds(ids)) {
      const record = this.read(id);
      if (record) {
        found.set(id, record);
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
    for (const { id, fields } of lastWins(records)) {
      this.table.set(id, structuredClone(fields));
    }
    return records.map(({ id, fields }) => this.read(id) ?? joinRecord(id, fields));
  }

  async delete(id: RecordId): Promise<boolean> {
    return this.table.delete(assertRecordId(id));
  }

  async deleteBulk(ids: readonly RecordId[]): Promise<number> {
    let removed = 0;
    for (const id of uniqueIds(ids)) {
      if (this.table.delete(id)) {
        removed++;
      }
    }
    return removed;
  }

  async updateBulk(updates: RecordUpdates): Promise<number> {
    let updated = 0;
    for (const { id, fields } of normalizeUpdates(updates)) {
      const existing = this.table.get(id);
      if (existing) {
        this.table.set(id, { ...existing, ...structuredClone(fields) });
        updated++;
      }
    }
    return updated;
  }

  /**
   * Up to `limit` ids greater than the cursor, in ascending order.
   */
  private keysAfter(cursor: RecordId | null, limit: number): RecordId[] {
    const keys = Array.from(this.table.keys()).sort();
    const start = cursor === null ? 0 : keys.findIndex((id) => id > cursor);
    return start === -1 ? [] : keys.slice(start, start + limit);
  }

  async *streamAll(options: StreamOptions = {}): AsyncGenerator<EntityRecord> {
    const batchSize = resolveBatchSize(options.batchSize);
    let after: RecordId | null = null;

    while (true) {
      options.signal?.throwIfAborted();

      const batch = this.keysAfter(after, batchSize);
      for (const id of batch) {
        const record = this.read(id);
        if (record) {
          yield record;
        }
      }

      if (batch.length < batchSize) {
        return;
      }
      after = batch[batch.length - 1];
    }
  }
}

/**
 * Create a complete in-memory repository context.
 *
 * All data is stored in memory and will not persist between restarts.
 * Useful for development and testing.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * // Use like any other repository context
 * await repos.records('courses').save({ title: 'Intro' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.get('courses')?.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const data: InMemoryDataStore = new Map();

  const context: RepositoryContext = {
    backend: 'memory',
    records: (collection) => new InMemoryRecordRepository(data, collection),
  };

  return {
    ...context,
    // Snapshot before running; restore the snapshot if fn throws.
    // Not isolated from concurrent writers outside the transaction.
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const snapshot = cloneStore(data);
      try {
        return await fn(context);
      } catch (error) {
        data.clear();
        for (const [collection, records] of snapshot) {
          data.set(collection, records);
        }
        throw error;
      }
    },
    _data: data,
    clear() {
      data.clear();
    },
  };
}
