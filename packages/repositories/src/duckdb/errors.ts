import { BackendError, BackendUnavailableError, errorMessage, FastAppError } from '@fastapp/protocol';

// DuckDB reports failures as plain errors; the message prefix carries the class
const UNAVAILABLE_PATTERN = /^(IO Error|Connection Error)|closed|disconnected/i;

/**
 * Whether an error means the database could not be opened or reached.
 */
export function isConnectionFailure(error: unknown): boolean {
  return error instanceof Error && UNAVAILABLE_PATTERN.test(error.message);
}

/**
 * Translate a DuckDB error into the shared taxonomy.
 * Errors that are already translated pass through unchanged.
 */
export function translateDuckDbError(error: unknown, operation: string): FastAppError {
  if (error instanceof FastAppError) {
    return error;
  }
  if (isConnectionFailure(error)) {
    return new BackendUnavailableError('duckdb', `${operation} failed: ${errorMessage(error)}`, error);
  }
  return new BackendError('duckdb', `${operation} failed: ${errorMessage(error)}`, error);
}
