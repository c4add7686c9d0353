import { wrapError } from '@batchpay/core';
import type { Logger } from '@batchpay/logger';
import type { ControlledTransaction, Kysely } from 'kysely';
import type { Result } from 'neverthrow';

/**
 * Run a Result-returning unit of work inside one transaction.
 *
 * Commits when `fn` resolves to Ok. Rolls back when it resolves to Err or throws;
 * a throw is converted into an Err carrying `errorContext`.
 *
 * Everything inside `fn` must go through `trx`: SQLite has a single connection,
 * and a query issued on the outer `db` would wait for this transaction forever.
 */
export async function withControlledTransaction<T, DB>(
  db: Kysely<DB>,
  logger: Logger,
  fn: (trx: ControlledTransaction<DB>) => Promise<Result<T, Error>>,
  errorContext: string
): Promise<Result<T, Error>> {
  let trx: ControlledTransaction<DB> | undefined;

  try {
    trx = await db.startTransaction().execute();
    const result = await fn(trx);

    if (result.isErr()) {
      await trx.rollback().execute();
      return result;
    }

    await trx.commit().execute();
    return result;
  } catch (error) {
    if (trx) {
      try {
        await trx.rollback().execute();
      } catch (rollbackError) {
        logger.error({ rollbackError }, 'Failed to roll back transaction');
      }
    }
    return wrapError(error, errorContext);
  }
}
