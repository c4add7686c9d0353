import { getErrorMessage, wrapError } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Apply every pending migration from an in-code registry, in key order.
 *
 * Migrations are registered as a `Record<string, Migration>` rather than read
 * from a folder, so the same code runs from sources (tests) and from a bundle.
 * Returns the names of the migrations executed by this call.
 */
export async function runMigrations<DB>(
  db: Kysely<DB>,
  migrations: Record<string, Migration>
): Promise<Result<string[], Error>> {
  try {
    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();
    const executed: string[] = [];

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        executed.push(result.migrationName);
        logger.debug(`Migration "${result.migrationName}" executed`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(`Migration failed: ${getErrorMessage(error, 'Unknown migration error')}`));
    }

    if (executed.length === 0) {
      logger.debug('No pending migrations');
    }

    return ok(executed);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
