import { DomainError } from '@batchpay/core';

/**
 * Failures returned by the engine's boundary operations.
 *
 * Every one of them leaves shared state untouched, except TransferFailedError,
 * which is returned after the failed batch has been recorded, and
 * RecordWriteFailedError, returned after transfers ran but nothing was recorded.
 */
export abstract class EngineError extends DomainError {
  readonly severity = 'error' as const;
}

/**
 * Caller lacks the owner role, or lacks signer status / enough signatures for a high-value batch
 */
export class UnauthorizedError extends EngineError {
  readonly code = 'UNAUTHORIZED';

  constructor(
    public readonly operation: string,
    public readonly caller: string,
    reason: string
  ) {
    super(`${caller} is not authorized to ${operation}: ${reason}`, { context: { operation, caller } });
  }
}

export class InvalidTimeError extends EngineError {
  readonly code = 'INVALID_TIME';

  constructor(
    public readonly hourOfDay: number,
    public readonly startHour: number,
    public readonly endHour: number
  ) {
    super(`Hour ${hourOfDay} is outside the business-hour window [${startHour}, ${endHour}]`, {
      context: { hourOfDay, startHour, endHour },
    });
  }
}

export class InsufficientBalanceError extends EngineError {
  readonly code = 'INSUFFICIENT_BALANCE';

  constructor(
    public readonly availableBalance: bigint,
    public readonly requiredBalance: bigint
  ) {
    super(`Available balance ${availableBalance} is below the required ${requiredBalance}`, {
      context: { availableBalance: availableBalance.toString(), requiredBalance: requiredBalance.toString() },
    });
  }
}

export interface TransferFailedDetails {
  batchId: number;
  failedIndex: number;
  reason: string;
  /** Whether already-applied transfers were reversed; undefined when compensation is disabled */
  compensated?: boolean | undefined;
}

/**
 * A transfer failed after gating passed. The batch has been recorded with success=false.
 */
export class TransferFailedError extends EngineError {
  readonly code = 'TRANSFER_FAILED';
  readonly batchId: number;
  readonly failedIndex: number;
  readonly compensated: boolean | undefined;

  constructor(details: TransferFailedDetails, options?: { cause?: unknown }) {
    super(`Batch ${details.batchId} failed at instruction ${details.failedIndex}: ${details.reason}`, {
      context: { ...details },
      cause: options?.cause,
    });
    this.batchId = details.batchId;
    this.failedIndex = details.failedIndex;
    this.compensated = details.compensated;
  }
}

export interface RecordWriteFailedDetails {
  batchId: number;
  /** Whether every applied transfer was reversed; undefined when compensation is disabled */
  compensated?: boolean | undefined;
}

/**
 * Transfers ran but the batch record could not be stored. No record exists and the
 * batch id did not advance.
 */
export class RecordWriteFailedError extends EngineError {
  readonly code = 'RECORD_WRITE_FAILED';
  readonly batchId: number;
  readonly compensated: boolean | undefined;

  constructor(details: RecordWriteFailedDetails, options?: { cause?: unknown }) {
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Batch ${details.batchId} ran but its record could not be stored${cause}`, {
      context: { ...details },
      cause: options?.cause,
    });
    this.batchId = details.batchId;
    this.compensated = details.compensated;
  }
}

/**
 * An engine threshold or window is inconsistent (configuration validation)
 */
export class InvalidThresholdError extends EngineError {
  readonly code = 'INVALID_THRESHOLD';

  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(`Invalid threshold '${field}': ${reason}`, { context: { field } });
  }
}

/**
 * Malformed request: instruction/signature list too long, bad principal or amount, bad metric value
 */
export class InvalidInputError extends EngineError {
  readonly code = 'INVALID_INPUT';
}

export class PerformanceGateClosedError extends EngineError {
  readonly code = 'PERFORMANCE_GATE_CLOSED';

  constructor(public readonly performanceMetric: number) {
    super(`Performance metric ${performanceMetric} must be greater than 0`, { context: { performanceMetric } });
  }
}

export class EngineNotInitializedError extends EngineError {
  readonly code = 'ENGINE_NOT_INITIALIZED';

  constructor() {
    super('Engine state has not been initialized with an owner');
  }
}

export type BatchGateError = InvalidTimeError | UnauthorizedError | InsufficientBalanceError | PerformanceGateClosedError;

export type EngineErrorCode =
  | UnauthorizedError['code']
  | InvalidTimeError['code']
  | InsufficientBalanceError['code']
  | TransferFailedError['code']
  | RecordWriteFailedError['code']
  | InvalidThresholdError['code']
  | InvalidInputError['code']
  | PerformanceGateClosedError['code']
  | EngineNotInitializedError['code'];
