// Record types - the unit of storage for every repository backend
//
// A record is an opaque, id-keyed field mapping. Backends own the persisted
// shape; the repository layer only guarantees the id round-trips.

/**
 * Record primary key
 */
export type RecordId = string;

/**
 * Arbitrary field mapping stored alongside the id.
 */
export type RecordFields = Record<string, unknown>;

/**
 * A stored record: its fields plus the id.
 */
export type EntityRecord<T extends RecordFields = RecordFields> = T & { id: RecordId };

/**
 * A record about to be saved. The id is generated when absent.
 */
export type NewRecord<T extends RecordFields = RecordFields> = T & { id?: RecordId };

/**
 * Partial-field updates keyed by record id.
 */
export type RecordUpdates<T extends RecordFields = RecordFields> =
  | ReadonlyMap<RecordId, Partial<T>>
  | Readonly<Record<RecordId, Partial<T>>>;

/**
 * Backends a repository can be bound to.
 */
export type BackendKind = 'memory' | 'postgres' | 'mongo' | 'duckdb' | 'redis';
