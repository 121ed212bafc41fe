// Settings - typed configuration from environment variables
//
// Parsed once at startup. Unset and empty variables fall back to defaults;
// anything present but malformed is a ConfigurationError.

import { z } from 'zod';
import { ConfigurationError, type LogLevel } from '@fastapp/protocol';

export const APP_ENVIRONMENTS = ['development', 'test', 'staging', 'production'] as const;

export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    APP_ENV: z.enum(APP_ENVIRONMENTS).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    ADDONS_CONFIG: z.string().default('config/addons.json'),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_MAX_CONNECTIONS: positiveInt.default(10),
    MONGO_URI: z.string().url().optional(),
    MONGO_DB_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/).default('fastapp'),
    MONGO_MAX_POOL_SIZE: positiveInt.default(10),
    DUCKDB_PATH: z.string().optional(),
    REDIS_URL: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.APP_ENV === 'production' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'Required in production',
      });
    }
  });

export type Settings = {
  env: AppEnvironment;
  logLevel: LogLevel;
  addonsConfigPath: string;
  database?: {
    url: string;
    maxConnections: number;
  };
  mongo?: {
    uri: string;
    dbName: string;
    maxPoolSize: number;
  };
  duckdb?: {
    path: string;
  };
  redisUrl?: string;
};

/**
 * Build settings from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid settings: ${issues.join('; ')}`, { issues });
  }

  const parsed = result.data;
  return {
    env: parsed.APP_ENV,
    logLevel: parsed.LOG_LEVEL,
    addonsConfigPath: parsed.ADDONS_CONFIG,
    database: parsed.DATABASE_URL
      ? { url: parsed.DATABASE_URL, maxConnections: parsed.DATABASE_MAX_CONNECTIONS }
      : undefined,
    mongo: parsed.MONGO_URI
      ? {
          uri: parsed.MONGO_URI,
          dbName: parsed.MONGO_DB_NAME,
          maxPoolSize: parsed.MONGO_MAX_POOL_SIZE,
        }
      : undefined,
    duckdb: parsed.DUCKDB_PATH ? { path: parsed.DUCKDB_PATH } : undefined,
    redisUrl: parsed.REDIS_URL,
  };
}
