// Add-on Registry - mounts the resolved add-ons onto a host
//
// - Modules register under their add-on name
// - mountAll resolves the configuration, orders it and mounts each add-on
//   at its path, recording a status per add-on
// - One registry per application: construct it, never share a global

import {
  ConfigurationError,
  errorMessage,
  isValidAddonName,
  prerequisitesOf,
  type AddonConfig,
  type AddonName,
  type Logger,
  type ResolvedAddons,
  type Timestamp,
} from '@fastapp/protocol';
import { AddonNotFoundError } from '../errors.js';
import type { Settings } from '../config/settings.js';
import { silentLogger } from '../logging.js';
import { mountPath, resolveAddons, resolveMountOrder } from './resolver.js';

// --- Types ---

/**
 * An add-on implementation. `mount` wires routes, handlers and the like
 * onto the host under the given URL prefix.
 */
export type AddonModule<THost> = {
  name: AddonName;
  title?: string;

  mount(host: THost, prefix: string): void | Promise<void>;

  /**
   * Report unmet runtime requirements (missing API keys, backends).
   * An empty list means the add-on can mount.
   */
  checkRequirements?(settings: Settings): string[] | Promise<string[]>;
};

export type AddonMountStatus = 'mounted' | 'missing' | 'error' | 'skipped';

/**
 * Outcome of mounting one add-on
 */
export type AddonMountRecord = {
  name: AddonName;
  status: AddonMountStatus;
  mountPath: string;
  title?: string;
  mountedAt?: Timestamp;
  error?: string;
};

/**
 * Result of mounting every resolved add-on
 */
export type MountResult = {
  /** Resolved add-on set */
  resolved: ResolvedAddons;

  /** Mount order used */
  order: AddonName[];

  /** Successfully mounted add-ons, in mount order */
  mounted: AddonName[];

  /** Add-ons that were missing, failed or skipped */
  failed: AddonMountRecord[];
};

export type MountOptions = {
  settings: Settings;

  /** Throw AddonNotFoundError instead of recording a missing module */
  strict?: boolean;
};

// --- Registry ---

export class AddonRegistry<THost> {
  private readonly modules = new Map<AddonName, AddonModule<THost>>();
  private readonly records = new Map<AddonName, AddonMountRecord>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register an add-on module.
   * @throws ConfigurationError for a malformed or duplicate name
   */
  register(module: AddonModule<THost>): this {
    if (!isValidAddonName(module.name)) {
      throw new ConfigurationError(`Invalid add-on name: "${module.name}"`, { name: module.name });
    }
    if (this.modules.has(module.name)) {
      throw new ConfigurationError(`Add-on already registered: ${module.name}`, {
        name: module.name,
      });
    }
    this.modules.set(module.name, module);
    return this;
  }

  get(name: AddonName): AddonModule<THost> | undefined {
    return this.modules.get(name);
  }

  has(name: AddonName): boolean {
    return this.modules.has(name);
  }

  /**
   * Resolve, order and mount every active add-on.
   *
   * Configuration errors (cycles, empty names) propagate. Per-add-on problems
   * are recorded as statuses: a module that is not registered is `missing`,
   * one whose requirements are unmet or whose mount throws is `error`, and one
   * whose prerequisite did not mount is `skipped`.
   */
  async mountAll(config: AddonConfig, host: THost, options: MountOptions): Promise<MountResult> {
    const resolved = resolveAddons(config.enabled, config.dependencies);
    const order = resolveMountOrder(resolved, config.dependencies);
    this.records.clear();

    this.logger.info('Resolved add-ons', { addons: order });

    const mounted: AddonName[] = [];
    const failed: AddonMountRecord[] = [];

    for (const name of order) {
      const record = await this.mountOne(name, config, host, options);
      this.records.set(name, record);
      if (record.status === 'mounted') {
        mounted.push(name);
      } else {
        failed.push(record);
      }
    }

    this.logger.info('Add-ons mounted', {
      mounted: mounted.length,
      failed: failed.length,
    });

    return { resolved, order, mounted, failed };
  }

  private async mountOne(
    name: AddonName,
    config: AddonConfig,
    host: THost,
    options: MountOptions
  ): Promise<AddonMountRecord> {
    const prefix = mountPath(name, config.mounts);
    const module = this.modules.get(name);

    if (!module) {
      if (options.strict) {
        throw new AddonNotFoundError(name);
      }
      this.logger.warn('No module registered for add-on', { addon: name });
      return { name, status: 'missing', mountPath: prefix };
    }

    const base = { name, mountPath: prefix, title: module.title };

    const blocked = prerequisitesOf(config.dependencies, name).filter(
      (prerequisite) => this.records.get(prerequisite)?.status !== 'mounted'
    );
    if (blocked.length > 0) {
      const error = `Prerequisites not mounted: ${blocked.join(', ')}`;
      this.logger.warn('Skipped add-on', { addon: name, error });
      return { ...base, status: 'skipped', error };
    }

    try {
      const unmet = (await module.checkRequirements?.(options.settings)) ?? [];
      if (unmet.length > 0) {
        const error = `Unmet requirements: ${unmet.join(', ')}`;
        this.logger.warn('Add-on requirements not met', { addon: name, error });
        return { ...base, status: 'error', error };
      }

      await module.mount(host, prefix);
    } catch (error) {
      this.logger.error('Failed to mount add-on', { addon: name, error: errorMessage(error) });
      return { ...base, status: 'error', error: errorMessage(error) };
    }

    this.logger.info('Mounted add-on', { addon: name, mountPath: prefix });
    return { ...base, status: 'mounted', mountedAt: new Date().toISOString() };
  }

  /**
   * Outcome of the last mountAll for an add-on
   */
  status(name: AddonName): AddonMountRecord | undefined {
    return this.records.get(name);
  }

  getMounted(): AddonMountRecord[] {
    return Array.from(this.records.values()).filter((r) => r.status === 'mounted');
  }

  isMounted(name: AddonName): boolean {
    return this.records.get(name)?.status === 'mounted';
  }

  /**
   * Path a mounted add-on lives under, or undefined if it is not mounted
   */
  mountPathOf(name: AddonName): string | undefined {
    const record = this.records.get(name);
    return record?.status === 'mounted' ? record.mountPath : undefined;
  }
}
