import type { BulkWriteOptions, ClientSession } from 'mongodb';
import {
  assertIdentifier,
  assertRecordId,
  ValidationError,
  type EntityRecord,
  type NewRecord,
  type RecordFields,
  type RecordId,
  type RecordUpdates,
} from '@fastapp/protocol';
import type { RecordRepository, StreamOptions } from '../interfaces/index.js';
import {
  lastWins,
  normalizeUpdates,
  resolveBatchSize,
  splitRecord,
  uniqueIds,
} from '../records.js';
import { documentFields, fromDocument, toDocument, type RecordDocument } from './documents.js';
import { translateMongoError } from './errors.js';

/**
 * Resolves the session to run under, or undefined outside a transaction.
 * Called on every operation so a repository bound to a finished transaction fails.
 */
export type SessionSource = () => ClientSession | undefined;

type SessionOptions = { session?: ClientSession };
export type RecordIdFilter = { _id: RecordId };
export type RecordIdsFilter = { _id: { $in: RecordId[] } };

export type RecordWrite =
  | { replaceOne: { filter: RecordIdFilter; replacement: RecordFields; upsert: true } }
  | { updateOne: { filter: RecordIdFilter; update: { $set: RecordFields } } };

export interface RecordCursor {
  sort(sort: { _id: 1 }): RecordCursor;
  batchSize(size: number): RecordCursor;
  next(): Promise<RecordDocument | null>;
  toArray(): Promise<RecordDocument[]>;
  close(): Promise<void>;
}

/**
 * The slice of a driver `Collection<RecordDocument>` the repository uses.
 */
export interface RecordCollection {
  readonly collectionName: string;
  findOne(filter: RecordIdFilter, options: SessionOptions): Promise<RecordDocument | null>;
  find(filter: RecordIdsFilter | Record<string, never>, options: SessionOptions): RecordCursor;
  bulkWrite(operations: RecordWrite[], options: BulkWriteOptions): Promise<{ matchedCount: number }>;
  deleteOne(filter: RecordIdFilter, options: SessionOptions): Promise<{ deletedCount: number }>;
  deleteMany(filter: RecordIdsFilter, options: SessionOptions): Promise<{ deletedCount: number }>;
  countDocuments(filter: RecordIdsFilter, options: SessionOptions): Promise<number>;
}

/**
 * `$set` reads dots as paths and `$` as operators, so patch keys may use neither.
 */
export function assertPatchField(field: string): string {
  if (field.includes('.') || field.startsWith('$')) {
    throw new ValidationError(`Patch field cannot contain "." or start with "$": ${field}`, {
      field,
    });
  }
  return field;
}

/**
 * RecordRepository over one MongoDB collection of `{ _id, ...fields }` documents.
 */
export class MongoRecordRepository implements RecordRepository {
  readonly collection: string;

  constructor(
    private readonly documents: RecordCollection,
    private readonly session: SessionSource = () => undefined
  ) {
    this.collection = assertIdentifier(documents.collectionName, 'collection');
  }

  private async run<T>(
    operation: string,
    command: (session: ClientSession | undefined) => Promise<T>
  ): Promise<T> {
    const session = this.session();
    try {
      return await command(session);
    } catch (error) {
      throw translateMongoError(error, `${operation} on ${this.collection}`);
    }
  }

  async get(id: RecordId): Promise<EntityRecord | null> {
    const key = assertRecordId(id);
    const document = await this.run('get', (session) =>
      this.documents.findOne({ _id: key }, { session })
    );
    return document ? fromDocument(document) : null;
  }

  async getBulk(ids: readonly RecordId[]): Promise<Map<RecordId, EntityRecord>> {
    const keys = uniqueIds(ids);
    const found = new Map<RecordId, EntityRecord>();
    if (keys.length === 0) {
      return found;
    }

    const documents = await this.run('getBulk', (session) =>
      this.documents.find({ _id: { $in: keys } }, { session }).toArray()
    );
    for (const document of documents) {
      const record = fromDocument(document);
      found.set(record.id, record);
    }
    return found;
  }

  async save(entity: NewRecord): Promise<EntityRecord> {
    const [saved] = await this.saveBulk([entity]);
    return saved;
  }

  async saveBulk(entities: readonly NewRecord[]): Promise<EntityRecord[]> {
    const records = entities.map(splitRecord);
    const stored = lastWins(records);
    if (stored.length === 0) {
      return [];
    }

    const operations: RecordWrite[] = stored.map(({ id, fields }) => ({
      replaceOne: {
        filter: { _id: id },
        replacement: documentFields(fields),
        upsert: true,
      },
    }));
    await this.run('saveBulk', (session) =>
      this.documents.bulkWrite(operations, { ordered: true, session })
    );

    const byId = new Map<RecordId, RecordFields>();
    for (const { id, fields } of stored) {
      byId.set(id, fields);
    }
    return records.map(({ id, fields }) =>
      fromDocument(toDocument(id, byId.get(id) ?? fields))
    );
  }

  async delete(id: RecordId): Promise<boolean> {
    const key = assertRecordId(id);
    const result = await this.run('delete', (session) =>
      this.documents.deleteOne({ _id: key }, { session })
    );
    return result.deletedCount > 0;
  }

  async deleteBulk(ids: readonly RecordId[]): Promise<number> {
    const keys = uniqueIds(ids);
    if (keys.length === 0) {
      return 0;
    }
    const result = await this.run('deleteBulk', (session) =>
      this.documents.deleteMany({ _id: { $in: keys } }, { session })
    );
    return result.deletedCount;
  }

  /**
   * Patches become `$set` of top-level fields. MongoDB rejects an empty `$set`,
   * so empty patches only count the records that exist.
   * @throws ValidationError before any write if a patch key is dotted or starts with "$"
   */
  async updateBulk(updates: RecordUpdates): Promise<number> {
    const entries = normalizeUpdates(updates).map(({ id, fields }) => ({
      id,
      fields: documentFields(fields),
    }));
    for (const { fields } of entries) {
      Object.keys(fields).forEach(assertPatchField);
    }

    const patches = entries.filter(({ fields }) => Object.keys(fields).length > 0);
    const touches = entries.filter(({ fields }) => Object.keys(fields).length === 0);
    let updated = 0;

    if (patches.length > 0) {
      const operations: RecordWrite[] = patches.map(
        ({ id, fields }) => ({
          updateOne: { filter: { _id: id }, update: { $set: fields } },
        })
      );
      const result = await this.run('updateBulk', (session) =>
        this.documents.bulkWrite(operations, { ordered: true, session })
      );
      updated += result.matchedCount;
    }

    if (touches.length > 0) {
      const keys = touches.map(({ id }) => id);
      updated += await this.run('updateBulk', (session) =>
        this.documents.countDocuments({ _id: { $in: keys } }, { session })
      );
    }

    return updated;
  }

  /**
   * Walks the collection in `_id` order with one driver cursor, closed when the
   * consumer stops iterating, aborts or the stream ends.
   */
  async *streamAll(options: StreamOptions = {}): AsyncGenerator<EntityRecord> {
    const batchSize = resolveBatchSize(options.batchSize);
    options.signal?.throwIfAborted();

    const cursor = this.documents
      .find({}, { session: this.session() })
      .sort({ _id: 1 })
      .batchSize(batchSize);

    try {
      let yielded = 0;
      while (true) {
        const document = await this.run('streamAll', () => cursor.next());
        if (document === null) {
          return;
        }
        yield fromDocument(document);
        yielded++;
        if (yielded % batchSize === 0) {
          options.signal?.throwIfAborted();
        }
      }
    } finally {
      await cursor.close();
    }
  }
}
