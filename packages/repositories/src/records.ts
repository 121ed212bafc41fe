// Shared record handling for every backend adapter.
//
// Adapters only deal in `{ id, fields }` pairs; these helpers do the id
// validation, id generation and update normalisation they all need.

import { randomUUID } from 'node:crypto';
import {
  assertRecordId,
  ValidationError,
  type EntityRecord,
  type NewRecord,
  type RecordFields,
  type RecordId,
  type RecordUpdates,
} from '@fastapp/protocol';

export const DEFAULT_STREAM_BATCH_SIZE = 500;

/**
 * A record split into its key and the fields stored beside it.
 */
export type StoredRecord = {
  id: RecordId;
  fields: RecordFields;
};

/**
 * Split a record about to be saved, generating an id when it has none.
 */
export function splitRecord(entity: NewRecord): StoredRecord {
  const { id, ...fields } = entity;
  return {
    id: id === undefined ? randomUUID() : assertRecordId(id),
    fields,
  };
}

/**
 * Join a stored key and fields back into a record.
 */
export function joinRecord(id: RecordId, fields: RecordFields): EntityRecord {
  return { ...fields, id };
}

/**
 * Collapse repeated ids so that the last occurrence wins, keeping first-seen order.
 */
export function lastWins(records: readonly StoredRecord[]): StoredRecord[] {
  const byId = new Map<RecordId, StoredRecord>();
  for (const record of records) {
    byId.set(record.id, record);
  }
  return Array.from(byId.values());
}

/**
 * Validate ids and drop repeats, preserving order.
 */
export function uniqueIds(ids: readonly unknown[]): RecordId[] {
  return Array.from(new Set(ids.map((id) => assertRecordId(id))));
}

function isUpdateMap<T extends RecordFields>(
  updates: RecordUpdates<T>
): updates is ReadonlyMap<RecordId, Partial<T>> {
  return updates instanceof Map;
}

/**
 * Turn a map or plain object of patches into validated `[id, fields]` pairs.
 * An `id` key inside a patch is dropped; empty patches are kept.
 */
export function normalizeUpdates(updates: RecordUpdates): StoredRecord[] {
  const entries = isUpdateMap(updates) ? Array.from(updates) : Object.entries(updates);

  return entries.map(([id, patch]) => {
    const { id: _ignored, ...fields } = patch;
    return { id: assertRecordId(id), fields };
  });
}

/**
 * Validate a stream batch size, defaulting when absent.
 */
export function resolveBatchSize(batchSize: number | undefined): number {
  const size = batchSize ?? DEFAULT_STREAM_BATCH_SIZE;
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${size}`, {
      field: 'batchSize',
    });
  }
  return size;
}

/**
 * Split a list into consecutive slices of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
