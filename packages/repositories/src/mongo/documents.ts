// Record <-> document mapping. The record id is stored as `_id`.

import type { EntityRecord, RecordFields, RecordId } from '@fastapp/protocol';
import { joinRecord } from '../records.js';

export type RecordDocument = {
  _id: RecordId;
  [field: string]: unknown;
};

/**
 * Fields safe to store beside `_id`: a stray `_id` key is dropped.
 */
export function documentFields(fields: RecordFields): RecordFields {
  const { _id: _dropped, ...rest } = fields;
  return rest;
}

export function toDocument(id: RecordId, fields: RecordFields): RecordDocument {
  return { ...documentFields(fields), _id: id };
}

export function fromDocument(document: RecordDocument): EntityRecord {
  const { _id, ...fields } = document;
  return joinRecord(String(_id), fields);
}
