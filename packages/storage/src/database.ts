import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { closeSqliteDatabase } from './close.js';
import { runMigrations } from './migrations.js';
import { stateMigrations } from './migrations/index.js';
import type { StateDatabase } from './schema.js';

const logger = getLogger('SqliteDatabase');

/**
 * Create and configure a SQLite-backed Kysely database instance.
 * Parent directories are created for file databases.
 */
export function createSqliteDatabase<T>(dbPath: string): Result<Kysely<T>, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

/**
 * Open the contract state database and bring its schema up to date.
 */
export async function openStateDatabase(dbPath: string): Promise<Result<Kysely<StateDatabase>, Error>> {
  const dbResult = createSqliteDatabase<StateDatabase>(dbPath);
  if (dbResult.isErr()) {
    return err(dbResult.error);
  }

  const db = dbResult.value;
  const migrationResult = await runMigrations(db, stateMigrations);
  if (migrationResult.isErr()) {
    await closeSqliteDatabase(db);
    return err(migrationResult.error);
  }

  return ok(db);
}
