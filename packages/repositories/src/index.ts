// @fastapp/repositories
// Storage-agnostic record repositories.
//
// This package defines the "contract" for data operations. The backend
// implementations (in-memory, Postgres, MongoDB, DuckDB) fulfill it, so calling
// code works against any of them unchanged.
//
// Key concepts:
// - RecordRepository is the uniform CRUD, batch and streaming contract
// - RepositoryContext hands out repositories for one backend
// - Backend errors are translated to the shared taxonomy at the adapter boundary
// - Redis is an event bus collaborator, not a repository backend

export * from './interfaces/index.js';
export * from './records.js';
export * from './typed.js';
export * from './events/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
export * as mongo from './mongo/index.js';
export * as duckdb from './duckdb/index.js';
export * as redis from './redis/index.js';
