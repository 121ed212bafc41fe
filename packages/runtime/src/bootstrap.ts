// Application bootstrap - startup and shutdown in one place
//
// Startup order:
// 1. Settings and logger
// 2. Add-on configuration, resolved before any backend is touched
// 3. Repository contexts (memory always; postgres, mongo, duckdb when configured)
// 4. Event bus (Redis when REDIS_URL is set, else in-memory)
// 5. Add-on mounting, when a registry and host are given
//
// Shutdown closes everything in reverse order of construction.

import {
  errorMessage,
  type AddonConfig,
  type AddonName,
  type EventBus,
  type Logger,
  type ResolvedAddons,
} from '@fastapp/protocol';
import {
  createInMemoryRepositoryContext,
  duckdb,
  mongo,
  postgres,
  redis,
  type InMemoryRepositoryContext,
  type TransactionalRepositoryContext,
} from '@fastapp/repositories';
import type { AddonRegistry, MountResult } from './addons/registry.js';
import { loadAddonConfig } from './addons/loader.js';
import { isAddonEnabled, mountPath, resolveAddons, resolveMountOrder } from './addons/resolver.js';
import { loadSettings, type Settings } from './config/settings.js';
import { ShutdownError } from './errors.js';
import { InMemoryEventBus } from './events/bus.js';
import { consoleLogger, withMinimumLevel } from './logging.js';

// --- Types ---

/**
 * A backend handle plus the function that releases it
 */
export type Managed<T> = {
  value: T;
  close(): Promise<void>;
};

/**
 * How each external backend is opened. Defaults connect to the real services;
 * tests swap in in-process stand-ins.
 */
export type BackendConnectors = {
  postgres(
    config: NonNullable<Settings['database']>,
    logger: Logger
  ): Promise<Managed<TransactionalRepositoryContext>>;
  mongo(
    config: NonNullable<Settings['mongo']>,
    logger: Logger
  ): Promise<Managed<mongo.MongoRepositoryContext>>;
  duckdb(
    config: NonNullable<Settings['duckdb']>,
    logger: Logger
  ): Promise<Managed<duckdb.DuckDbRepositoryContext>>;
  redis(url: string, logger: Logger): Promise<Managed<EventBus>>;
};

export type ApplicationRepositories = {
  memory: InMemoryRepositoryContext;
  postgres?: TransactionalRepositoryContext;
  mongo?: mongo.MongoRepositoryContext;
  duckdb?: duckdb.DuckDbRepositoryContext;
};

export type ApplicationAddons = {
  config: AddonConfig;
  resolved: ResolvedAddons;
  order: AddonName[];
  mountPath(name: AddonName): string;
  isEnabled(name: AddonName): boolean;
  /** Present when a registry and host were given */
  mount?: MountResult;
};

export type Application = {
  settings: Settings;
  addons: ApplicationAddons;
  repositories: ApplicationRepositories;
  events: EventBus;
  logger: Logger;

  /** Close every backend in reverse order. Idempotent. */
  shutdown(): Promise<void>;
};

export type CreateApplicationOptions<THost> = {
  /** Defaults to loadSettings() over process.env */
  settings?: Settings;
  /** Defaults to the file at settings.addonsConfigPath */
  addonConfig?: AddonConfig;
  registry?: AddonRegistry<THost>;
  host?: THost;
  logger?: Logger;
  connectors?: Partial<BackendConnectors>;
};

// --- Default connectors ---

export const defaultConnectors: BackendConnectors = {
  async postgres(config) {
    const { db, client } = postgres.createDatabase({
      connectionString: config.url,
      maxConnections: config.maxConnections,
    });
    return {
      value: postgres.createPgRepositoryContext(db),
      close: () => client.end(),
    };
  },

  async mongo(config, logger) {
    const client = mongo.createMongoClient(config);
    const context = mongo.createMongoRepositoryContext(client, config.dbName);
    return {
      value: context,
      async close() {
        const rolledBack = await context.rollbackOpenTransactions();
        if (rolledBack.length > 0) {
          logger.warn('Rolled back open transactions', { transactions: rolledBack });
        }
        await client.close();
      },
    };
  },

  async duckdb(config, logger) {
    const database = await duckdb.openDuckDb({ path: config.path });
    return {
      value: duckdb.createDuckDbRepositoryContext(database.connection, {
        createTables: true,
        logger,
      }),
      async close() {
        database.close();
      },
    };
  },

  async redis(url, logger) {
    const bus = redis.RedisEventBus.connect(url, { logger });
    return { value: bus, close: () => bus.close() };
  },
};

// --- Lifecycle ---

type Closer = {
  name: string;
  close(): Promise<void>;
};

async function closeAll(closers: Closer[], logger: Logger): Promise<string[]> {
  const failures: string[] = [];
  for (const closer of [...closers].reverse()) {
    try {
      await closer.close();
      logger.info('Closed backend', { backend: closer.name });
    } catch (error) {
      failures.push(`${closer.name}: ${errorMessage(error)}`);
      logger.error('Failed to close backend', { backend: closer.name, error: errorMessage(error) });
    }
  }
  return failures;
}

/**
 * Build the application from settings and add-on configuration.
 *
 * Configuration errors abort before any backend is opened. If a later step
 * fails, everything opened so far is closed before the error is rethrown.
 */
export async function createApplication<THost>(
  options: CreateApplicationOptions<THost> = {}
): Promise<Application> {
  const settings = options.settings ?? loadSettings();
  const logger = options.logger ?? withMinimumLevel(consoleLogger, settings.logLevel);
  const connectors: BackendConnectors = { ...defaultConnectors, ...options.connectors };

  const config = options.addonConfig ?? (await loadAddonConfig(settings.addonsConfigPath, logger));
  const resolved = resolveAddons(config.enabled, config.dependencies);
  const order = resolveMountOrder(resolved, config.dependencies);
  logger.info('Resolved add-ons', { addons: order });

  const closers: Closer[] = [];

  try {
    const memory = createInMemoryRepositoryContext();
    const repositories: ApplicationRepositories = { memory };

    if (settings.database) {
      const managed = await connectors.postgres(settings.database, logger);
      closers.push({ name: 'postgres', close: managed.close });
      repositories.postgres = managed.value;
      logger.info('Connected backend', { backend: 'postgres' });
    }

    if (settings.mongo) {
      const managed = await connectors.mongo(settings.mongo, logger);
      closers.push({ name: 'mongo', close: managed.close });
      repositories.mongo = managed.value;
      logger.info('Connected backend', { backend: 'mongo' });
    }

    if (settings.duckdb) {
      const managed = await connectors.duckdb(settings.duckdb, logger);
      closers.push({ name: 'duckdb', close: managed.close });
      repositories.duckdb = managed.value;
      logger.info('Connected backend', { backend: 'duckdb' });
    }

    let events: EventBus;
    if (settings.redisUrl) {
      const managed = await connectors.redis(settings.redisUrl, logger);
      closers.push({ name: 'redis', close: managed.close });
      events = managed.value;
    } else {
      const bus = new InMemoryEventBus({ logger });
      closers.push({ name: 'events', close: () => bus.close() });
      events = bus;
    }

    const addons: ApplicationAddons = {
      config,
      resolved,
      order,
      mountPath: (name) => mountPath(name, config.mounts),
      isEnabled: (name) => isAddonEnabled(name, resolved),
    };

    if (options.registry && options.host !== undefined) {
      addons.mount = await options.registry.mountAll(config, options.host, { settings });
    }

    let shuttingDown: Promise<void> | undefined;

    return {
      settings,
      addons,
      repositories,
      events,
      logger,
      shutdown() {
        shuttingDown ??= (async () => {
          logger.info('Shutting down');
          const failures = await closeAll(closers, logger);
          if (failures.length > 0) {
            throw new ShutdownError(failures);
          }
        })();
        return shuttingDown;
      },
    };
  } catch (error) {
    logger.error('Startup failed', { error: errorMessage(error) });
    await closeAll(closers, logger);
    throw error;
  }
}
