import { BackendError, BackendUnavailableError, errorMessage, FastAppError } from '@fastapp/protocol';

// ioredis reports lost connections by message; sockets by code
const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE']);
const UNAVAILABLE_MESSAGES = /Connection is closed|Stream isn't writeable|Event bus is closed|MaxRetriesPerRequestError|Reached the max retries/i;

export function isConnectionFailure(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    if (typeof error.code === 'string' && UNAVAILABLE_CODES.has(error.code)) {
      return true;
    }
  }
  return error instanceof Error && UNAVAILABLE_MESSAGES.test(`${error.name} ${error.message}`);
}

/**
 * Translate an ioredis error into the shared taxonomy.
 * Errors that are already translated pass through unchanged.
 */
export function translateRedisError(error: unknown, operation: string): FastAppError {
  if (error instanceof FastAppError) {
    return error;
  }
  if (isConnectionFailure(error)) {
    return new BackendUnavailableError('redis', `${operation} failed: ${errorMessage(error)}`, error);
  }
  return new BackendError('redis', `${operation} failed: ${errorMessage(error)}`, error);
}
