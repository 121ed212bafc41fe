// Runtime error types
//
// The shared taxonomy lives in @fastapp/protocol; these are the few errors
// only the runtime raises.

import { FastAppError } from '@fastapp/protocol';

/**
 * Error when a resolved add-on has no registered module and mounting is strict.
 */
export class AddonNotFoundError extends FastAppError {
  readonly addonName: string;

  constructor(addonName: string) {
    super('ADDON_NOT_FOUND', `Add-on not found: ${addonName}`, { addonName });
    this.name = 'AddonNotFoundError';
    this.addonName = addonName;
  }
}

/**
 * Error when one or more resources failed to close during shutdown.
 */
export class ShutdownError extends FastAppError {
  readonly failures: string[];

  constructor(failures: string[]) {
    super('SHUTDOWN_FAILED', `Shutdown failed: ${failures.join('; ')}`, { failures });
    this.name = 'ShutdownError';
    this.failures = failures;
  }
}
