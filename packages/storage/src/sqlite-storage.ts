import { wrapError } from '@ftgate/core';
import type { Kysely } from 'kysely';
import { ok, type Result } from 'neverthrow';

import type { StateDatabase } from './schema.js';
import type { Storage, StorageEntry } from './storage.js';

/**
 * Storage backed by the `contract_state` table. Every contract instance gets
 * its own namespace (its address), so one database file can hold many.
 */
export class SqliteStorage implements Storage {
  constructor(
    private readonly db: Kysely<StateDatabase>,
    readonly namespace: string
  ) {}

  async get(key: string): Promise<Result<string | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('contract_state')
        .select('value')
        .where('namespace', '=', this.namespace)
        .where('key', '=', key)
        .executeTakeFirst();
      return ok(row?.value);
    } catch (error) {
      return wrapError(error, `Failed to read "${key}"`);
    }
  }

  set(key: string, value: string): Promise<Result<void, Error>> {
    return this.setMany([{ key, value }]);
  }

  async setMany(entries: readonly StorageEntry[]): Promise<Result<void, Error>> {
    if (entries.length === 0) {
      return ok(undefined);
    }

    const updatedAt = new Date().toISOString();
    try {
      await this.db.transaction().execute(async (trx) => {
        for (const entry of entries) {
          await trx
            .insertInto('contract_state')
            .values({ namespace: this.namespace, key: entry.key, value: entry.value, updated_at: updatedAt })
            .onConflict((oc) =>
              oc.columns(['namespace', 'key']).doUpdateSet((eb) => ({
                value: eb.ref('excluded.value'),
                updated_at: eb.ref('excluded.updated_at'),
              }))
            )
            .execute();
        }
      });
      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to write ${entries.length} state entries`);
    }
  }
}
