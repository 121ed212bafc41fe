// Add-ons - resolution, configuration loading and mounting

export { isAddonEnabled, mountPath, resolveAddons, resolveMountOrder } from './resolver.js';
export { loadAddonConfig, parseAddonConfig } from './loader.js';
export {
  AddonRegistry,
  type AddonModule,
  type AddonMountRecord,
  type AddonMountStatus,
  type MountOptions,
  type MountResult,
} from './registry.js';
