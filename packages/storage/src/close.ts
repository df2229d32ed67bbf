import { wrapError } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import type { Kysely } from 'kysely';
import { ok, type Result } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export async function closeSqliteDatabase<DB>(db: Kysely<DB>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}
