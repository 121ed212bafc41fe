// Typed views over untyped record repositories.

import type { z } from 'zod';
import {
  ValidationError,
  type EntityRecord,
  type NewRecord,
  type RecordFields,
  type RecordId,
  type RecordUpdates,
} from '@fastapp/protocol';
import type { RecordRepository, StreamOptions } from './interfaces/index.js';

/**
 * Record schema accepted by withSchema. Output is the typed record; input is
 * whatever the backend hands back.
 */
export type RecordSchema<T extends RecordFields> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Wrap a repository so every record it returns is parsed with a zod schema.
 *
 * Usage:
 * ```ts
 * const Course = z.object({ title: z.string(), seats: z.number().int() });
 * const courses = withSchema(repos.records('courses'), Course);
 * const course = await courses.get('c-1'); // { id, title, seats } | null
 * ```
 *
 * @throws ValidationError when a stored record does not match the schema
 */
export function withSchema<T extends RecordFields>(
  repository: RecordRepository,
  schema: RecordSchema<T>
): RecordRepository<T> {
  function parse(record: EntityRecord): EntityRecord<T> {
    const result = schema.safeParse(record);
    if (!result.success) {
      throw new ValidationError(
        `Record ${record.id} in ${repository.collection} does not match its schema`,
        {
          field: result.error.issues[0]?.path.join('.'),
          details: { id: record.id, issues: result.error.issues },
        }
      );
    }
    return { ...result.data, id: record.id };
  }

  return {
    collection: repository.collection,

    async get(id: RecordId) {
      const record = await repository.get(id);
      return record ? parse(record) : null;
    },

    async getBulk(ids: readonly RecordId[]) {
      const found = await repository.getBulk(ids);
      const parsed = new Map<RecordId, EntityRecord<T>>();
      for (const [id, record] of found) {
        parsed.set(id, parse(record));
      }
      return parsed;
    },

    async save(entity: NewRecord<T>) {
      return parse(await repository.save(entity));
    },

    async saveBulk(entities: readonly NewRecord<T>[]) {
      const saved = await repository.saveBulk(entities);
      return saved.map(parse);
    },

    delete(id: RecordId) {
      return repository.delete(id);
    },

    deleteBulk(ids: readonly RecordId[]) {
      return repository.deleteBulk(ids);
    },

    updateBulk(updates: RecordUpdates<T>) {
      return repository.updateBulk(updates);
    },

    async *streamAll(options?: StreamOptions) {
      for await (const record of repository.streamAll(options)) {
        yield parse(record);
      }
    },
  };
}
