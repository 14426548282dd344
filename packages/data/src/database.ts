import * as fs from 'node:fs';
import * as path from 'node:path';

import { isErrorWithMessage, wrapError } from '@bullion-ledger/core';
import { getDatabasePath } from '@bullion-ledger/env';
import { getLogger } from '@bullion-ledger/logger';
import Database from 'better-sqlite3';
import { Kysely, Migrator, SqliteDialect, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import * as initialSchema from './migrations/001_initial_schema.js';
import type { DatabaseSchema } from './schema/database-schema.js';

export type KyselyDB = Kysely<DatabaseSchema>;

const logger = getLogger('Database');

const migrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};

/**
 * Open a SQLite-backed Kysely instance. Pass ':memory:' for an in-process database.
 */
export function createDatabase(dbPath: string): Result<KyselyDB, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
    sqliteDb.pragma('busy_timeout = 5000');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<DatabaseSchema>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

export async function closeDatabase(db: KyselyDB): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}

/**
 * Run all pending migrations.
 *
 * Migrations are registered programmatically rather than read from disk so
 * the same code path works under Vitest and from compiled output.
 */
export async function runMigrations(db: KyselyDB): Promise<Result<void, Error>> {
  try {
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
      return err(new Error(isErrorWithMessage(error) ? error.message : 'Unknown migration error'));
    }

    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}

export async function getMigrationStatus(
  db: KyselyDB
): Promise<Result<{ executed: string[]; pending: string[] }, Error>> {
  try {
    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const allMigrations = await migrator.getMigrations();

    return ok({
      executed: allMigrations.filter((m) => m.executedAt !== undefined).map((m) => m.name),
      pending: allMigrations.filter((m) => m.executedAt === undefined).map((m) => m.name),
    });
  } catch (error) {
    logger.error({ error }, 'Failed to get migration status');
    return wrapError(error, 'Failed to get migration status');
  }
}

/**
 * Open the database and bring its schema up to date. Defaults to the
 * configured database file.
 */
export async function initializeDatabase(dbPath: string = getDatabasePath()): Promise<Result<KyselyDB, Error>> {
  const databaseResult = createDatabase(dbPath);
  if (databaseResult.isErr()) {
    return databaseResult;
  }

  const database = databaseResult.value;

  const migrationResult = await runMigrations(database);
  if (migrationResult.isErr()) {
    const closeResult = await closeDatabase(database);
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close database after migration failure');
    }
    return err(migrationResult.error);
  }

  logger.debug('Database initialization completed');
  return ok(database);
}
