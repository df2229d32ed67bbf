import { getErrorMessage, wrapError } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Run all pending migrations from a programmatic migration record keyed by
 * migration name (e.g. '001_contract_state'). A programmatic provider keeps
 * the migrations loadable from TypeScript sources under the test runner.
 */
export async function runMigrations<DB>(
  db: Kysely<DB>,
  migrations: Record<string, Migration>
): Promise<Result<void, Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        logger.debug(`Migration "${result.migrationName}" executed successfully`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(getErrorMessage(error, 'Unknown migration error')));
    }

    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
