// Tests for application startup and shutdown

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, type AddonConfig } from '@fastapp/protocol';
import { createInMemoryRepositoryContext, duckdb } from '@fastapp/repositories';
import { AddonRegistry } from './addons/registry.js';
import { loadSettings } from './config/settings.js';
import { ShutdownError } from './errors.js';
import { InMemoryEventBus } from './events/bus.js';
import { createCapturingLogger } from './logging.js';
import { createApplication, type BackendConnectors } from './bootstrap.js';

// --- Test Fixtures ---

const ADDON_CONFIG: AddonConfig = {
  enabled: { auth: true, commerce: true, media: false },
  dependencies: { commerce: ['auth'] },
  mounts: { commerce: '/shop' },
};

type TestHost = { routes: string[] };

/**
 * Connectors that stand in for the network backends and record what they did.
 */
function createFakeConnectors(events: string[]): Partial<BackendConnectors> {
  return {
    async postgres() {
      events.push('open postgres');
      return {
        value: createInMemoryRepositoryContext(),
        close: async () => {
          events.push('close postgres');
        },
      };
    },
    async duckdb(config) {
      events.push('open duckdb');
      const database = await duckdb.openDuckDb({ path: config.path });
      return {
        value: duckdb.createDuckDbRepositoryContext(database.connection, { createTables: true }),
        close: async () => {
          database.close();
          events.push('close duckdb');
        },
      };
    },
    async redis() {
      events.push('open redis');
      const bus = new InMemoryEventBus();
      return {
        value: bus,
        close: async () => {
          await bus.close();
          events.push('close redis');
        },
      };
    },
  };
}

// --- Tests ---

describe('createApplication', () => {
  it('should start with only the in-memory backend by default', async () => {
    const app = await createApplication({
      settings: loadSettings({}),
      addonConfig: ADDON_CONFIG,
      logger: createCapturingLogger(),
    });

    expect(app.repositories.memory.backend).toBe('memory');
    expect(app.repositories.postgres).toBeUndefined();
    expect(app.repositories.mongo).toBeUndefined();
    expect(app.repositories.duckdb).toBeUndefined();
    expect(app.events).toBeInstanceOf(InMemoryEventBus);

    await app.shutdown();
  });

  it('should expose the resolved add-ons', async () => {
    const app = await createApplication({
      settings: loadSettings({}),
      addonConfig: ADDON_CONFIG,
      logger: createCapturingLogger(),
    });

    expect(Array.from(app.addons.resolved)).toEqual(['auth', 'commerce']);
    expect(app.addons.order).toEqual(['auth', 'commerce']);
    expect(app.addons.isEnabled('commerce')).toBe(true);
    expect(app.addons.isEnabled('media')).toBe(false);
    expect(app.addons.mountPath('commerce')).toBe('/shop');
    expect(app.addons.mountPath('auth')).toBe('/auth');
    expect(app.addons.mount).toBeUndefined();

    await app.shutdown();
  });

  it('should open configured backends and close them in reverse order', async () => {
    const events: string[] = [];
    const app = await createApplication({
      settings: loadSettings({
        DATABASE_URL: 'postgres://localhost:5432/app',
        DUCKDB_PATH: ':memory:',
        REDIS_URL: 'redis://localhost:6379',
      }),
      addonConfig: ADDON_CONFIG,
      logger: createCapturingLogger(),
      connectors: createFakeConnectors(events),
    });

    expect(app.repositories.postgres?.backend).toBe('memory');
    expect(app.repositories.duckdb?.backend).toBe('duckdb');

    await app.repositories.duckdb?.records('page_views').save({ id: 'v-1', path: '/shop' });
    const rows = await app.repositories.duckdb?.query(
      'SELECT count(*)::INTEGER AS n FROM page_views'
    );
    expect(rows).toEqual([{ n: 1 }]);

    await app.shutdown();

    expect(events).toEqual([
      'open postgres',
      'open duckdb',
      'open redis',
      'close redis',
      'close duckdb',
      'close postgres',
    ]);
  });

  it('should shut down only once', async () => {
    const events: string[] = [];
    const app = await createApplication({
      settings: loadSettings({ DATABASE_URL: 'postgres://localhost:5432/app' }),
      addonConfig: ADDON_CONFIG,
      logger: createCapturingLogger(),
      connectors: createFakeConnectors(events),
    });

    await Promise.all([app.shutdown(), app.shutdown()]);
    await app.shutdown();

    expect(events.filter((e) => e === 'close postgres')).toHaveLength(1);
  });

  it('should fail before opening backends on a configuration error', async () => {
    const events: string[] = [];

    await expect(
      createApplication({
        settings: loadSettings({ DATABASE_URL: 'postgres://localhost:5432/app' }),
        addonConfig: {
          enabled: { a: true },
          dependencies: { a: ['b'], b: ['a'] },
          mounts: {},
        },
        logger: createCapturingLogger(),
        connectors: createFakeConnectors(events),
      })
    ).rejects.toThrow(ConfigurationError);

    expect(events).toEqual([]);
  });

  it('should close what was opened when a later backend fails', async () => {
    const events: string[] = [];
    const connectors: Partial<BackendConnectors> = {
      ...createFakeConnectors(events),
      async mongo() {
        throw new Error('connection refused');
      },
    };

    await expect(
      createApplication({
        settings: loadSettings({
          DATABASE_URL: 'postgres://localhost:5432/app',
          MONGO_URI: 'mongodb://localhost:27017',
        }),
        addonConfig: ADDON_CONFIG,
        logger: createCapturingLogger(),
        connectors,
      })
    ).rejects.toThrow('connection refused');

    expect(events).toEqual(['open postgres', 'close postgres']);
  });

  it('should report close failures after closing everything else', async () => {
    const events: string[] = [];
    const logger = createCapturingLogger();
    const connectors: Partial<BackendConnectors> = {
      ...createFakeConnectors(events),
      async redis() {
        return {
          value: new InMemoryEventBus(),
          close: async () => {
            throw new Error('socket hang up');
          },
        };
      },
    };

    const app = await createApplication({
      settings: loadSettings({
        DATABASE_URL: 'postgres://localhost:5432/app',
        REDIS_URL: 'redis://localhost:6379',
      }),
      addonConfig: ADDON_CONFIG,
      logger,
      connectors,
    });

    await expect(app.shutdown()).rejects.toThrow(ShutdownError);
    await expect(app.shutdown()).rejects.toThrow('Shutdown failed: redis: socket hang up');
    expect(events).toEqual(['open postgres', 'close postgres']);
    expect(logger.entries.some((e) => e.message === 'Failed to close backend')).toBe(true);
  });

  it('should mount add-ons when a registry and host are given', async () => {
    const registry = new AddonRegistry<TestHost>();
    const host: TestHost = { routes: [] };
    for (const name of ['auth', 'commerce']) {
      registry.register({
        name,
        mount(target, prefix) {
          target.routes.push(prefix);
        },
      });
    }

    const app = await createApplication({
      settings: loadSettings({}),
      addonConfig: ADDON_CONFIG,
      registry,
      host,
      logger: createCapturingLogger(),
    });

    expect(app.addons.mount?.mounted).toEqual(['auth', 'commerce']);
    expect(host.routes).toEqual(['/auth', '/shop']);

    await app.shutdown();
  });

  it('should load the add-on config from the settings path', async () => {
    const configPath = fileURLToPath(new URL('../../../config/addons.json', import.meta.url));
    const app = await createApplication({
      settings: loadSettings({ ADDONS_CONFIG: configPath }),
      logger: createCapturingLogger(),
    });

    expect(app.addons.order).toEqual(['auth', 'commerce', 'lms']);
    expect(app.addons.mountPath('commerce')).toBe('/shop');

    await app.shutdown();
  });
});
