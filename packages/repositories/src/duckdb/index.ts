// DuckDB backend: the analytical store, via @duckdb/node-api

export * from './connection.js';
export * from './errors.js';
export * from './record-repository.js';
export * from './context.js';
