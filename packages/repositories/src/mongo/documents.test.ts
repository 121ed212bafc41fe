// Tests for record <-> document mapping

import { describe, it, expect } from 'vitest';
import { documentFields, fromDocument, toDocument } from './documents.js';

describe('toDocument', () => {
  it('should store the id as _id', () => {
    expect(toDocument('u-1', { name: 'Ada' })).toEqual({ _id: 'u-1', name: 'Ada' });
  });

  it('should not let a field override _id', () => {
    expect(toDocument('u-1', { _id: 'other', name: 'Ada' })).toEqual({ _id: 'u-1', name: 'Ada' });
  });
});

describe('fromDocument', () => {
  it('should expose _id as id', () => {
    expect(fromDocument({ _id: 'u-1', name: 'Ada', tags: ['x'] })).toEqual({
      id: 'u-1',
      name: 'Ada',
      tags: ['x'],
    });
  });

  it('should round-trip with toDocument', () => {
    const fields = { nested: { a: 1 }, list: [1, 2] };
    expect(fromDocument(toDocument('r-9', fields))).toEqual({ id: 'r-9', ...fields });
  });
});

describe('documentFields', () => {
  it('should drop a stray _id', () => {
    expect(documentFields({ _id: 'x', a: 1 })).toEqual({ a: 1 });
  });
});
