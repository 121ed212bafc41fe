// Identifier validation
//
// Table, collection and column names are interpolated into query text by the
// SQL backends, so they are checked against a strict allow-list before any
// query is built. Record ids are always bound as parameters but still have to
// be well-formed strings.

import { ValidationError } from '../errors.js';
import type { RecordId } from '../types/records.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/** Longest identifier Postgres accepts; applied to every backend. */
export const MAX_IDENTIFIER_LENGTH = 63;

export const MAX_RECORD_ID_LENGTH = 255;

export type IdentifierKind = 'table' | 'collection' | 'column';

/**
 * Check whether a string is a safe dynamic identifier.
 */
export function isValidIdentifier(name: string): boolean {
  return name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(name);
}

/**
 * Throw ValidationError unless the name is a safe dynamic identifier.
 * @returns The name unchanged
 */
export function assertIdentifier(name: unknown, kind: IdentifierKind): string {
  if (typeof name !== 'string' || !isValidIdentifier(name)) {
    throw new ValidationError(`Invalid ${kind} name: ${JSON.stringify(name)}`, {
      field: kind,
      details: { name },
    });
  }
  return name;
}

/**
 * Throw ValidationError unless the value is a well-formed record id.
 */
export function assertRecordId(id: unknown): RecordId {
  if (typeof id !== 'string' || id.length === 0) {
    throw new ValidationError('Record id must be a non-empty string', {
      field: 'id',
      details: { id },
    });
  }
  if (id.length > MAX_RECORD_ID_LENGTH || CONTROL_CHARACTERS.test(id)) {
    throw new ValidationError(`Invalid record id: ${JSON.stringify(id)}`, {
      field: 'id',
      details: { id },
    });
  }
  return id;
}

/**
 * Validate every id in a batch.
 */
export function assertRecordIds(ids: readonly unknown[]): RecordId[] {
  return ids.map((id) => assertRecordId(id));
}
