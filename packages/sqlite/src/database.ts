import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect, type KyselyPlugin } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import { sqliteTypeAdapterPlugin } from './plugins/sqlite-type-adapter-plugin.js';

const logger = getLogger('SqliteDatabase');

export const IN_MEMORY_DATABASE = ':memory:';

export interface CreateSqliteDatabaseOptions {
  /** Additional Kysely plugins (sqliteTypeAdapterPlugin is always applied first) */
  plugins?: KyselyPlugin[] | undefined;
  /** How long a writer waits on a locked database before failing. Default 5000 */
  busyTimeoutMs?: number | undefined;
}

/**
 * Open (or create) a SQLite file and wrap it in a Kysely instance.
 *
 * The parent directory is created when missing. Pass `:memory:` for a
 * throwaway database (tests).
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  try {
    if (dbPath !== IN_MEMORY_DATABASE) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const sqliteDb = new Database(dbPath, { timeout: options?.busyTimeoutMs ?? 5000 });

    sqliteDb.pragma('foreign_keys = ON');
    if (dbPath !== IN_MEMORY_DATABASE) {
      sqliteDb.pragma('journal_mode = WAL');
    }
    sqliteDb.pragma('synchronous = NORMAL');

    logger.debug({ dbPath }, 'Opened SQLite database');

    let kysely = new Kysely<T>({
      dialect: new SqliteDialect({ database: sqliteDb }),
    });

    for (const plugin of [sqliteTypeAdapterPlugin, ...(options?.plugins ?? [])]) {
      kysely = kysely.withPlugin(plugin);
    }

    return ok(kysely);
  } catch (error) {
    logger.error({ error, dbPath }, 'Error opening SQLite database');
    return wrapError(error, `Failed to open SQLite database: ${dbPath}`);
  }
}
