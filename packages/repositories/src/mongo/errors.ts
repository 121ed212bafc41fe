import {
  MongoNetworkError,
  MongoNotConnectedError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
} from 'mongodb';
import { BackendError, BackendUnavailableError, errorMessage, FastAppError } from '@fastapp/protocol';

/**
 * Whether a driver error means the cluster could not be reached.
 */
export function isConnectionFailure(error: unknown): boolean {
  return (
    error instanceof MongoNetworkError ||
    error instanceof MongoServerSelectionError ||
    error instanceof MongoNotConnectedError ||
    error instanceof MongoTopologyClosedError
  );
}

/**
 * Translate a driver error into the shared taxonomy.
 * Errors that are already translated pass through unchanged.
 */
export function translateMongoError(error: unknown, operation: string): FastAppError {
  if (error instanceof FastAppError) {
    return error;
  }
  if (isConnectionFailure(error)) {
    return new BackendUnavailableError('mongo', `${operation} failed: ${errorMessage(error)}`, error);
  }
  return new BackendError('mongo', `${operation} failed: ${errorMessage(error)}`, error);
}
