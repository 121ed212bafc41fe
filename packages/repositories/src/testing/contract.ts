// Shared behaviour every RecordRepository backend must satisfy.
//
// Each backend's test file calls describeRecordRepositoryContract with a
// factory; every test works on a fresh collection so one database serves
// the whole suite.

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ValidationError, type EntityRecord } from '@fastapp/protocol';
import type {
  RecordRepository,
  StreamOptions,
  TransactionalRepositoryContext,
} from '../interfaces/index.js';

export type ContractHarness = {
  context: TransactionalRepositoryContext;
  teardown?: () => Promise<void>;
};

async function collect(
  repository: RecordRepository,
  options?: StreamOptions
): Promise<EntityRecord[]> {
  const records: EntityRecord[] = [];
  for await (const record of repository.streamAll(options)) {
    records.push(record);
  }
  return records;
}

function sortedIds(records: Iterable<EntityRecord>): string[] {
  return Array.from(records, (r) => r.id).sort();
}

export function describeRecordRepositoryContract(
  name: string,
  createHarness: () => Promise<ContractHarness>
): void {
  describe(`${name} record repository contract`, () => {
    let harness: ContractHarness;
    let counter = 0;

    beforeAll(async () => {
      harness = await createHarness();
    });

    afterAll(async () => {
      await harness?.teardown?.();
    });

    function freshRepository(): RecordRepository {
      counter++;
      return harness.context.records(`contract_${counter}`);
    }

    describe('save and get', () => {
      it('should generate an id when none is given', async () => {
        const repo = freshRepository();
        const saved = await repo.save({ title: 'Intro' });

        expect(typeof saved.id).toBe('string');
        expect(saved.id.length).toBeGreaterThan(0);
        expect(saved.title).toBe('Intro');
        expect(await repo.get(saved.id)).toEqual({ id: saved.id, title: 'Intro' });
      });

      it('should keep a caller-supplied id', async () => {
        const repo = freshRepository();
        const saved = await repo.save({ id: 'course-1', title: 'Intro', seats: 30 });

        expect(saved).toEqual({ id: 'course-1', title: 'Intro', seats: 30 });
      });

      it('should round-trip nested values', async () => {
        const repo = freshRepository();
        const fields = { tags: ['a', 'b'], profile: { age: 41, active: true }, note: null };
        await repo.save({ id: 'n-1', ...fields });

        expect(await repo.get('n-1')).toEqual({ id: 'n-1', ...fields });
      });

      it('should return null for a missing id', async () => {
        const repo = freshRepository();
        expect(await repo.get('missing')).toBeNull();
      });

      it('should replace fields on a second save', async () => {
        const repo = freshRepository();
        await repo.save({ id: 'a', x: 1, y: 2 });
        await repo.save({ id: 'a', x: 3 });

        expect(await repo.get('a')).toEqual({ id: 'a', x: 3 });
      });
    });

    describe('saveBulk and getBulk', () => {
      it('should return exactly the saved records', async () => {
        const repo = freshRepository();
        const saved = await repo.saveBulk([
          { id: 'e1', n: 1 },
          { id: 'e2', n: 2 },
          { id: 'e3', n: 3 },
        ]);
        const found = await repo.getBulk(saved.map((r) => r.id));

        expect(found.size).toBe(3);
        expect(found.get('e1')).toEqual({ id: 'e1', n: 1 });
        expect(found.get('e2')).toEqual({ id: 'e2', n: 2 });
        expect(found.get('e3')).toEqual({ id: 'e3', n: 3 });
      });

      it('should preserve input order and length', async () => {
        const repo = freshRepository();
        const saved = await repo.saveBulk([{ id: 'z', n: 1 }, { n: 2 }, { id: 'a', n: 3 }]);

        expect(saved).toHaveLength(3);
        expect(saved[0].id).toBe('z');
        expect(saved[1].n).toBe(2);
        expect(saved[2].id).toBe('a');
      });

      it('should store the last occurrence of a repeated id', async () => {
        const repo = freshRepository();
        const saved = await repo.saveBulk([
          { id: 'd', v: 1 },
          { id: 'e', v: 2 },
          { id: 'd', v: 3 },
        ]);

        expect(saved.map((r) => r.id)).toEqual(['d', 'e', 'd']);
        expect(saved[0]).toEqual({ id: 'd', v: 3 });
        expect(await repo.get('d')).toEqual({ id: 'd', v: 3 });
      });

      it('should accept an empty batch', async () => {
        const repo = freshRepository();
        expect(await repo.saveBulk([])).toEqual([]);
        expect((await repo.getBulk([])).size).toBe(0);
      });

      it('should leave missing ids out of getBulk', async () => {
        const repo = freshRepository();
        await repo.saveBulk([{ id: 'a' }, { id: 'b' }]);
        const found = await repo.getBulk(['a', 'nope', 'b', 'a']);

        expect(sortedIds(found.values())).toEqual(['a', 'b']);
      });
    });

    describe('delete', () => {
      it('should report whether a record was removed', async () => {
        const repo = freshRepository();
        await repo.save({ id: 'gone' });

        expect(await repo.delete('gone')).toBe(true);
        expect(await repo.delete('gone')).toBe(false);
        expect(await repo.get('gone')).toBeNull();
      });

      it('should count only records actually removed', async () => {
        const repo = freshRepository();
        await repo.saveBulk([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);

        expect(await repo.deleteBulk(['a', 'b', 'missing', 'a'])).toBe(2);
        expect(sortedIds(await collect(repo))).toEqual(['c']);
      });
    });

    describe('updateBulk', () => {
      it('should merge top-level fields and count existing records', async () => {
        const repo = freshRepository();
        await repo.save({ id: 'a', name: 'A', profile: { age: 1, city: 'Lyon' } });
        await repo.save({ id: 'b', name: 'B' });

        const updated = await repo.updateBulk({
          a: { profile: { age: 2 } },
          b: { name: 'Bee', extra: true },
          missing: { name: 'nobody' },
        });

        expect(updated).toBe(2);
        expect(await repo.get('a')).toEqual({ id: 'a', name: 'A', profile: { age: 2 } });
        expect(await repo.get('b')).toEqual({ id: 'b', name: 'Bee', extra: true });
        expect(await repo.get('missing')).toBeNull();
      });

      it('should accept a Map and ignore id keys inside patches', async () => {
        const repo = freshRepository();
        await repo.save({ id: 'a', n: 1 });

        const updated = await repo.updateBulk(new Map([['a', { id: 'hijack', n: 2 }]]));

        expect(updated).toBe(1);
        expect(await repo.get('a')).toEqual({ id: 'a', n: 2 });
        expect(await repo.get('hijack')).toBeNull();
      });

      it('should return zero for no updates', async () => {
        const repo = freshRepository();
        expect(await repo.updateBulk({})).toBe(0);
      });
    });

    describe('streamAll', () => {
      it.each([1, 3, 7, 500])('should yield every record once with batch size %i', async (batchSize) => {
        const repo = freshRepository();
        const ids = ['r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7'];
        await repo.saveBulk(ids.map((id, n) => ({ id, n })));

        const records = await collect(repo, { batchSize });

        expect(records).toHaveLength(7);
        expect(sortedIds(records)).toEqual(ids);
      });

      it('should yield nothing for an empty collection', async () => {
        const repo = freshRepository();
        expect(await collect(repo)).toEqual([]);
      });

      it('should reject a batch size that is not a positive integer', async () => {
        const repo = freshRepository();
        await expect(collect(repo, { batchSize: 0 })).rejects.toThrow(ValidationError);
        await expect(collect(repo, { batchSize: 1.5 })).rejects.toThrow(ValidationError);
      });

      it('should stop before the next batch once aborted', async () => {
        const repo = freshRepository();
        await repo.saveBulk([{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'd' }]);
        const controller = new AbortController();
        const seen: string[] = [];

        const run = async () => {
          for await (const record of repo.streamAll({ batchSize: 2, signal: controller.signal })) {
            seen.push(record.id);
            controller.abort();
          }
        };

        let caught: unknown;
        try {
          await run();
        } catch (error) {
          caught = error;
        }

        expect(caught instanceof Error && caught.name).toBe('AbortError');
        expect(seen).toEqual(['a', 'b']);
      });

      it('should allow a new stream after breaking out of one', async () => {
        const repo = freshRepository();
        await repo.saveBulk([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);

        for await (const record of repo.streamAll({ batchSize: 1 })) {
          expect(record.id).toBeTruthy();
          break;
        }

        expect(await collect(repo)).toHaveLength(3);
      });
    });

    describe('validation', () => {
      it('should reject unsafe collection names before any query', () => {
        expect(() => harness.context.records('users; DROP TABLE users')).toThrow(ValidationError);
        expect(() => harness.context.records('bad name')).toThrow(ValidationError);
      });

      it('should reject malformed ids', async () => {
        const repo = freshRepository();
        await expect(repo.get('')).rejects.toThrow(ValidationError);
        await expect(repo.getBulk(['ok', ''])).rejects.toThrow(ValidationError);
        await expect(repo.save({ id: '' })).rejects.toThrow(ValidationError);
      });
    });

    describe('transaction', () => {
      it('should commit when the function resolves', async () => {
        const repo = freshRepository();
        const result = await harness.context.transaction(async (tx) => {
          await tx.records(repo.collection).save({ id: 'kept', n: 1 });
          return 'done';
        });

        expect(result).toBe('done');
        expect(await repo.get('kept')).toEqual({ id: 'kept', n: 1 });
      });

      it('should roll back and rethrow when the function throws', async () => {
        const repo = freshRepository();
        await repo.save({ id: 'before', n: 1 });
        const failure = new Error('checkout failed');

        await expect(
          harness.context.transaction(async (tx) => {
            const txRepo = tx.records(repo.collection);
            await txRepo.save({ id: 'during', n: 2 });
            await txRepo.updateBulk({ before: { n: 99 } });
            throw failure;
          })
        ).rejects.toBe(failure);

        expect(await repo.get('during')).toBeNull();
        expect(await repo.get('before')).toEqual({ id: 'before', n: 1 });
      });
    });
  });
}
