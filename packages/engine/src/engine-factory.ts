import { getLogger } from '@batchpay/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BatchTransferEngine } from './batch/batch-transfer-engine.js';
import type { ClockSource } from './clock/clock.js';
import { loadEngineConfig } from './config/engine-config.js';
import { SqliteLedgerTransferService } from './ledger/sqlite-ledger-transfer-service.js';
import { EngineDataContext } from './persistence/engine-data-context.js';

const logger = getLogger('EngineFactory');

export interface OpenEngineOptions {
  dbPath: string;
  clock: ClockSource;
  /** Partial engine configuration; defaults fill the rest */
  config?: unknown;
}

export interface EngineHandle {
  engine: BatchTransferEngine;
  ledger: SqliteLedgerTransferService;
  data: EngineDataContext;
  close(): Promise<Result<void, Error>>;
}

/**
 * Open an engine over a SQLite file, using the bundled ledger as its transfer service.
 */
export async function openBatchTransferEngine(options: OpenEngineOptions): Promise<Result<EngineHandle, Error>> {
  const configResult = loadEngineConfig(options.config ?? {});
  if (configResult.isErr()) return err(configResult.error);

  const dataResult = await EngineDataContext.initialize(options.dbPath);
  if (dataResult.isErr()) return err(dataResult.error);
  const data = dataResult.value;

  const ledger = new SqliteLedgerTransferService(data.connection);
  const engine = new BatchTransferEngine({
    data,
    transferService: ledger,
    clock: options.clock,
    config: configResult.value,
  });

  logger.debug({ dbPath: options.dbPath }, 'Engine opened');

  return ok({ engine, ledger, data, close: () => data.close() });
}
