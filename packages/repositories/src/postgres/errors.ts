import { BackendError, BackendUnavailableError, errorMessage, FastAppError } from '@fastapp/protocol';

// Socket-level codes from node and the postgres.js client
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

// admin_shutdown, too_many_connections
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '53300']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Whether a driver error means the server could not be reached.
 */
export function isConnectionFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) {
    return false;
  }
  // Class 08: connection exception
  return UNAVAILABLE_CODES.has(code) || UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08');
}

/**
 * Translate a driver error into the shared taxonomy.
 * Errors that are already translated pass through unchanged.
 */
export function translatePgError(error: unknown, operation: string): FastAppError {
  if (error instanceof FastAppError) {
    return error;
  }
  if (isConnectionFailure(error)) {
    return new BackendUnavailableError('postgres', `${operation} failed: ${errorMessage(error)}`, error);
  }
  return new BackendError('postgres', `${operation} failed: ${errorMessage(error)}`, error);
}
