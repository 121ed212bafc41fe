// @fastapp/runtime
// Add-on resolution and mounting, settings, logging and application lifecycle

// Add-ons
export {
  resolveAddons,
  resolveMountOrder,
  mountPath,
  isAddonEnabled,
  loadAddonConfig,
  parseAddonConfig,
  AddonRegistry,
  type AddonModule,
  type AddonMountRecord,
  type AddonMountStatus,
  type MountOptions,
  type MountResult,
} from './addons/index.js';

// Settings
export {
  loadSettings,
  APP_ENVIRONMENTS,
  type AppEnvironment,
  type Settings,
} from './config/settings.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  withMinimumLevel,
  type LogEntry,
} from './logging.js';

// Events
export { InMemoryEventBus } from './events/bus.js';

// Error types
export { AddonNotFoundError, ShutdownError } from './errors.js';

// Bootstrap
export {
  createApplication,
  defaultConnectors,
  type Application,
  type ApplicationAddons,
  type ApplicationRepositories,
  type BackendConnectors,
  type CreateApplicationOptions,
  type Managed,
} from './bootstrap.js';
