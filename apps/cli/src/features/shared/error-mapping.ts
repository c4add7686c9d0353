import { isDomainError } from '@batchpay/core';
import type { EngineErrorCode } from '@batchpay/engine';

import { ExitCodes, type ExitCode } from './exit-codes.js';

const EXIT_CODES_BY_ERROR: Record<EngineErrorCode, ExitCode> = {
  UNAUTHORIZED: ExitCodes.PERMISSION_DENIED,
  INVALID_TIME: ExitCodes.CONDITION_FAILED,
  INSUFFICIENT_BALANCE: ExitCodes.CONDITION_FAILED,
  PERFORMANCE_GATE_CLOSED: ExitCodes.CONDITION_FAILED,
  TRANSFER_FAILED: ExitCodes.TRANSFER_FAILED,
  RECORD_WRITE_FAILED: ExitCodes.DATABASE_ERROR,
  INVALID_THRESHOLD: ExitCodes.CONFIG_ERROR,
  INVALID_INPUT: ExitCodes.VALIDATION_ERROR,
  ENGINE_NOT_INITIALIZED: ExitCodes.NOT_INITIALIZED,
};

function isEngineErrorCode(code: string): code is EngineErrorCode {
  return Object.hasOwn(EXIT_CODES_BY_ERROR, code);
}

/**
 * Exit code for a failure returned by the engine. Plain errors are general failures.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (isDomainError(error) && isEngineErrorCode(error.code)) {
    return EXIT_CODES_BY_ERROR[error.code];
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Machine-readable code for JSON output: the domain code when there is one
 */
export function errorCodeFor(error: Error, fallback: string): string {
  return isDomainError(error) ? error.code : fallback;
}
