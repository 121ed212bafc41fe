// Postgres backend: drizzle-orm over postgres.js

export * from './db.js';
export * from './schema.js';
export * from './errors.js';
export * from './record-repository.js';
export * from './context.js';
