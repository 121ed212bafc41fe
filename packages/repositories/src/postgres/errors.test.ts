// Tests for Postgres error translation

import { describe, it, expect } from 'vitest';
import {
  BackendError,
  BackendUnavailableError,
  ValidationError,
} from '@fastapp/protocol';
import { isConnectionFailure, translatePgError } from './errors.js';

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isConnectionFailure', () => {
  it('should recognise socket and client connection codes', () => {
    expect(isConnectionFailure(driverError('refused', 'ECONNREFUSED'))).toBe(true);
    expect(isConnectionFailure(driverError('closed', 'CONNECTION_CLOSED'))).toBe(true);
  });

  it('should recognise connection-class SQLSTATEs', () => {
    expect(isConnectionFailure(driverError('lost', '08006'))).toBe(true);
    expect(isConnectionFailure(driverError('shutdown', '57P01'))).toBe(true);
    expect(isConnectionFailure(driverError('full', '53300'))).toBe(true);
  });

  it('should not treat query errors as connection failures', () => {
    expect(isConnectionFailure(driverError('duplicate key', '23505'))).toBe(false);
    expect(isConnectionFailure(new Error('no code'))).toBe(false);
    expect(isConnectionFailure('oops')).toBe(false);
  });
});

describe('translatePgError', () => {
  it('should map connection failures to BackendUnavailableError', () => {
    const cause = driverError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    const error = translatePgError(cause, 'get on users');

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error.code).toBe('BACKEND_UNAVAILABLE');
    expect(error.message).toBe(
      '[postgres] get on users failed: connect ECONNREFUSED 127.0.0.1:5432'
    );
    expect(error instanceof BackendError && error.cause).toBe(cause);
  });

  it('should map other failures to BackendError', () => {
    const error = translatePgError(driverError('syntax error', '42601'), 'query');

    expect(error).toBeInstanceOf(BackendError);
    expect(error).not.toBeInstanceOf(BackendUnavailableError);
    expect(error.code).toBe('BACKEND_ERROR');
  });

  it('should pass translated errors through', () => {
    const original = new ValidationError('Invalid table name: "x y"');
    expect(translatePgError(original, 'get')).toBe(original);
  });
});
