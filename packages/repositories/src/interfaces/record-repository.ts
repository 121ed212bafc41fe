import type {
  EntityRecord,
  NewRecord,
  RecordFields,
  RecordId,
  RecordUpdates,
} from '@fastapp/protocol';

/**
 * Options for streaming every record of a collection.
 */
export type StreamOptions = {
  /** Records fetched per round trip (default 500) */
  batchSize?: number;
  /** Stops the stream before the next batch is fetched */
  signal?: AbortSignal;
};

/**
 * Uniform CRUD, batch and streaming contract over one collection.
 *
 * The same calling code works against every backend: choose the
 * implementation when constructing the RepositoryContext, not at call sites.
 *
 * Absence is never an error: `get` resolves to null, `getBulk` leaves missing
 * ids out of the map and `delete` resolves to false.
 */
export interface RecordRepository<T extends RecordFields = RecordFields> {
  /** Table or collection name, already validated */
  readonly collection: string;

  get(id: RecordId): Promise<EntityRecord<T> | null>;

  /** Found records only, keyed by id */
  getBulk(ids: readonly RecordId[]): Promise<Map<RecordId, EntityRecord<T>>>;

  /**
   * Insert or replace a record. A missing id is generated.
   */
  save(entity: NewRecord<T>): Promise<EntityRecord<T>>;

  /**
   * Upsert many records. The result has one element per input, in input order,
   * each reflecting what is stored. When an id repeats, the last occurrence wins.
   */
  saveBulk(entities: readonly NewRecord<T>[]): Promise<EntityRecord<T>[]>;

  /** @returns true if a record was removed */
  delete(id: RecordId): Promise<boolean>;

  /** @returns Number of records actually removed */
  deleteBulk(ids: readonly RecordId[]): Promise<number>;

  /**
   * Shallow-merge fields into existing records. Never creates records and
   * ignores any `id` key inside a patch.
   *
   * @returns Number of records that existed and were updated
   */
  updateBulk(updates: RecordUpdates<T>): Promise<number>;

  /**
   * Lazily yield every record in id order, one batch in memory at a time.
   * One-shot: call again to restart.
   */
  streamAll(options?: StreamOptions): AsyncIterable<EntityRecord<T>>;
}

/**
 * Result row of an ad-hoc analytical query.
 */
export type QueryRow = Record<string, unknown>;

/**
 * Scalar values accepted as positional query parameters.
 */
export type QueryParam = string | number | boolean | null;

/**
 * Columnar backends add a raw query escape hatch for aggregation the uniform
 * contract cannot express.
 */
export interface AnalyticalRecordRepository<T extends RecordFields = RecordFields>
  extends RecordRepository<T> {
  query(sql: string, params?: readonly QueryParam[]): Promise<QueryRow[]>;
}
