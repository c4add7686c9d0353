import {
  EngineNotInitializedError,
  InsufficientBalanceError,
  InvalidInputError,
  InvalidThresholdError,
  InvalidTimeError,
  RecordWriteFailedError,
  TransferFailedError,
  UnauthorizedError,
} from '@batchpay/engine';
import { describe, expect, it } from 'vitest';

import { errorCodeFor, exitCodeForError } from '../error-mapping.js';
import { ExitCodes } from '../exit-codes.js';

describe('exit codes', () => {
  it('are unique', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('map engine errors to semantic codes', () => {
    expect(exitCodeForError(new UnauthorizedError('add signer', 'mallory', 'caller is not the owner'))).toBe(
      ExitCodes.PERMISSION_DENIED
    );
    expect(exitCodeForError(new InvalidTimeError(3, 9, 17))).toBe(ExitCodes.CONDITION_FAILED);
    expect(exitCodeForError(new InsufficientBalanceError(1n, 2n))).toBe(ExitCodes.CONDITION_FAILED);
    expect(exitCodeForError(new TransferFailedError({ batchId: 1, failedIndex: 0, reason: 'x' }))).toBe(
      ExitCodes.TRANSFER_FAILED
    );
    expect(exitCodeForError(new RecordWriteFailedError({ batchId: 1, compensated: true }))).toBe(
      ExitCodes.DATABASE_ERROR
    );
    expect(exitCodeForError(new InvalidThresholdError('blocksPerHour', 'bad'))).toBe(ExitCodes.CONFIG_ERROR);
    expect(exitCodeForError(new InvalidInputError('bad'))).toBe(ExitCodes.VALIDATION_ERROR);
    expect(exitCodeForError(new EngineNotInitializedError())).toBe(ExitCodes.NOT_INITIALIZED);
  });

  it('treat plain errors as general failures', () => {
    expect(exitCodeForError(new Error('disk full'))).toBe(ExitCodes.GENERAL_ERROR);
    expect(errorCodeFor(new Error('disk full'), 'GENERAL_ERROR')).toBe('GENERAL_ERROR');
    expect(errorCodeFor(new InvalidInputError('bad'), 'GENERAL_ERROR')).toBe('INVALID_INPUT');
  });
});
