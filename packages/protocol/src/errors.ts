// Error taxonomy shared by the resolver and every repository backend.
//
// Absence is not an error: lookups return null or omit the key instead.

import type { BackendKind } from './types/records.js';

/**
 * Base class for all FastApp errors.
 * Provides a stable code and structured details for logging.
 */
export class FastAppError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FastAppError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Malformed or unresolvable static configuration.
 * Fatal at startup; there is no degraded mode.
 */
export class ConfigurationError extends FastAppError {
  constructor(message: string, details?: Record<string, unknown>, code = 'CONFIGURATION_ERROR') {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A cycle in the add-on dependency graph.
 */
export class DependencyCycleError extends ConfigurationError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular add-on dependency: ${cycle.join(' -> ')}`, { cycle }, 'DEPENDENCY_CYCLE');
    this.name = 'DependencyCycleError';
    this.cycle = cycle;
  }
}

/**
 * Malformed input rejected before any backend call is made.
 */
export class ValidationError extends FastAppError {
  readonly field?: string;

  constructor(message: string, options?: { field?: string; details?: Record<string, unknown> }) {
    super('VALIDATION_ERROR', message, options?.details);
    this.name = 'ValidationError';
    this.field = options?.field;
  }
}

/**
 * Backend failure translated at the adapter boundary.
 * Callers never see a driver's native error type.
 */
export class BackendError extends FastAppError {
  readonly backend: BackendKind;
  readonly cause?: unknown;

  constructor(backend: BackendKind, message: string, cause?: unknown, code = 'BACKEND_ERROR') {
    super(code, `[${backend}] ${message}`, { backend });
    this.name = 'BackendError';
    this.backend = backend;
    this.cause = cause;
  }
}

/**
 * Connection-level failure (refused, reset, timed out, pool closed).
 * Distinct from application-level absence so callers can choose to retry.
 */
export class BackendUnavailableError extends BackendError {
  constructor(backend: BackendKind, message: string, cause?: unknown) {
    super(backend, message, cause, 'BACKEND_UNAVAILABLE');
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
