export * from './types.js';
export * from './errors.js';

export { EngineConfigSchema, DEFAULT_ENGINE_CONFIG, DEFAULT_HIGH_VALUE_THRESHOLD, loadEngineConfig } from './config/engine-config.js';
export type { EngineConfig, EngineConfigInput } from './config/engine-config.js';

export { HOURS_PER_DAY, hourOfDay, heightAtHour, ManualClock, SystemClock } from './clock/clock.js';
export type { ClockSource, SystemClockOptions } from './clock/clock.js';

export { AuthorizationRegistry, parsePrincipal } from './authorization/authorization-registry.js';

export {
  countDistinctSignatures,
  evaluateConditions,
  requiredBalanceFor,
  sumInstructionAmounts,
} from './conditions/condition-evaluator.js';
export type { ConditionConfig, ConditionEvaluation, ConditionInputs } from './conditions/condition-evaluator.js';
export { assertConditions } from './conditions/condition-gate.js';

export { TransferError } from './transfers/transfer-service.js';
export type { TransferErrorReason, TransferService } from './transfers/transfer-service.js';
export { TransferApplier } from './transfers/transfer-applier.js';
export type { ApplyOutcome } from './transfers/transfer-applier.js';
export { compensateTransfers } from './transfers/compensation.js';
export type { CompensationFailure, CompensationResult } from './transfers/compensation.js';

export { AuditLedger } from './audit/audit-ledger.js';

export { BatchTransferEngine } from './batch/batch-transfer-engine.js';
export type { BatchTransferEngineDeps, ExecuteBatchError } from './batch/batch-transfer-engine.js';
export { WriteQueue } from './batch/write-queue.js';

export { EngineDataContext } from './persistence/engine-data-context.js';
export type { EngineDatabase } from './persistence/schema.js';
export { engineMigrations } from './persistence/migrations/index.js';
export { SqliteLedgerTransferService } from './ledger/sqlite-ledger-transfer-service.js';

export { openBatchTransferEngine } from './engine-factory.js';
export type { EngineHandle, OpenEngineOptions } from './engine-factory.js';
