// Tests for the Postgres repositories, run against in-process PGlite

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { BackendError, BackendUnavailableError } from '@fastapp/protocol';
import { describeRecordRepositoryContract } from '../testing/index.js';
import { createPgRepositoryContext } from './context.js';
import { ensureRecordTable } from './schema.js';

describeRecordRepositoryContract('postgres', async () => {
  const client = new PGlite();
  const db = drizzle(client);
  return {
    context: createPgRepositoryContext(db, { createTables: true }),
    teardown: () => client.close(),
  };
});

describe('createPgRepositoryContext', () => {
  let client: PGlite;

  beforeAll(() => {
    client = new PGlite();
  });

  afterAll(async () => {
    await client.close();
  });

  it('should report the postgres backend', () => {
    expect(createPgRepositoryContext(drizzle(client)).backend).toBe('postgres');
  });

  it('should translate a missing table into a BackendError', async () => {
    const repos = createPgRepositoryContext(drizzle(client));

    const attempt = repos.records('never_created').get('x');

    await expect(attempt).rejects.toBeInstanceOf(BackendError);
    await expect(attempt).rejects.not.toBeInstanceOf(BackendUnavailableError);
    await expect(attempt).rejects.toThrow('[postgres] get on never_created failed');
  });

  it('should use tables created ahead of time', async () => {
    const db = drizzle(client);
    await ensureRecordTable(db, 'prepared');
    const repos = createPgRepositoryContext(db);

    await repos.records('prepared').save({ id: 'p-1', ok: true });

    expect(await repos.records('prepared').get('p-1')).toEqual({ id: 'p-1', ok: true });
  });

  it('should store fields in the data column', async () => {
    const db = drizzle(client);
    const repos = createPgRepositoryContext(db, { createTables: true });
    await repos.records('raw_rows').save({ id: 'r-1', total: 40 });

    const result = await client.query<{ id: string; total: number }>(
      "SELECT id, (data->>'total')::int AS total FROM raw_rows"
    );

    expect(result.rows).toEqual([{ id: 'r-1', total: 40 }]);
  });
});
