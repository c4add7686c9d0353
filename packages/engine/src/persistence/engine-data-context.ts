import { getLogger } from '@batchpay/logger';
import {
  closeSqliteDatabase,
  createSqliteDatabase,
  runMigrations,
  withControlledTransaction,
} from '@batchpay/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { engineMigrations } from './migrations/index.js';
import type { EngineDB } from './repositories/base-repository.js';
import { BatchRecordRepository } from './repositories/batch-record-repository.js';
import { EngineStateRepository } from './repositories/engine-state-repository.js';
import { SignerRepository } from './repositories/signer-repository.js';
import type { EngineDatabase } from './schema.js';

const logger = getLogger('EngineDataContext');

/**
 * Repositories over one engine database, plus a unit-of-work helper.
 */
export class EngineDataContext {
  /**
   * Open the database at `dbPath` and bring its schema up to date.
   */
  static async initialize(dbPath: string): Promise<Result<EngineDataContext, Error>> {
    const dbResult = createSqliteDatabase<EngineDatabase>(dbPath);
    if (dbResult.isErr()) return err(dbResult.error);

    const migrationResult = await runMigrations(dbResult.value, engineMigrations);
    if (migrationResult.isErr()) {
      const closeResult = await closeSqliteDatabase(dbResult.value);
      if (closeResult.isErr()) {
        logger.warn({ error: closeResult.error }, 'Failed to close database after migration error');
      }
      return err(migrationResult.error);
    }

    if (migrationResult.value.length > 0) {
      logger.info({ dbPath, migrations: migrationResult.value }, 'Applied engine migrations');
    }

    return ok(new EngineDataContext(dbResult.value));
  }

  readonly state: EngineStateRepository;
  readonly signers: SignerRepository;
  readonly records: BatchRecordRepository;

  readonly connection: EngineDB;

  constructor(connection: EngineDB) {
    this.connection = connection;
    this.state = new EngineStateRepository(connection);
    this.signers = new SignerRepository(connection);
    this.records = new BatchRecordRepository(connection);
  }

  /**
   * Run `fn` against a context whose repositories share one transaction.
   * Commits on ok(), rolls back on err() or throw.
   */
  async executeInTransaction<T>(fn: (tx: EngineDataContext) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    return withControlledTransaction(
      this.connection,
      logger,
      async (trx) => fn(new EngineDataContext(trx)),
      'Engine transaction failed'
    );
  }

  async close(): Promise<Result<void, Error>> {
    return closeSqliteDatabase(this.connection);
  }
}
