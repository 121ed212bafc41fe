import { MongoClient } from 'mongodb';

export type MongoConfig = {
  uri: string;
  dbName: string;
  maxPoolSize?: number;
};

/**
 * Create a MongoDB client. The driver connects on first use; the caller owns
 * the client and must `close()` it on shutdown.
 *
 * Usage:
 * ```ts
 * const client = createMongoClient({ uri: process.env.MONGO_URI, dbName: 'fastapp' });
 * const repos = createMongoRepositoryContext(client, 'fastapp');
 * ```
 */
export function createMongoClient(config: MongoConfig): MongoClient {
  return new MongoClient(config.uri, {
    maxPoolSize: config.maxPoolSize ?? 10,
    appName: config.dbName,
  });
}
