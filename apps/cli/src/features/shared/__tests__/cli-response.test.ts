import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('builds a success envelope with optional metadata', () => {
    expect(createSuccessResponse('records get', { id: 1 })).toEqual({
      success: true,
      command: 'records get',
      timestamp: '2024-01-01T00:00:00.000Z',
      data: { id: 1 },
    });

    expect(createSuccessResponse('records get', { id: 1 }, { duration_ms: 5 }).metadata).toEqual({ duration_ms: 5 });
  });

  it('builds an error envelope, with details only when given', () => {
    expect(createErrorResponse('execute', new Error('boom'), 'TRANSFER_FAILED')).toEqual({
      success: false,
      command: 'execute',
      timestamp: '2024-01-01T00:00:00.000Z',
      error: { code: 'TRANSFER_FAILED', message: 'boom' },
    });

    expect(createErrorResponse('execute', new Error('boom'), 'X', { batchId: 3 }).error).toEqual({
      code: 'X',
      message: 'boom',
      details: { batchId: 3 },
    });
  });

  it('names exit codes', () => {
    expect(exitCodeToErrorCode(ExitCodes.PERMISSION_DENIED)).toBe('PERMISSION_DENIED');
    expect(exitCodeToErrorCode(ExitCodes.CONDITION_FAILED)).toBe('CONDITION_FAILED');
  });
});
