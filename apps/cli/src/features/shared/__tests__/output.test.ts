import { InvalidTimeError } from '@batchpay/engine';
import { describe, expect, it } from 'vitest';

import { createCapturedIO } from '../../../__tests__/test-io.js';
import { ExitCodes } from '../exit-codes.js';
import { OutputManager } from '../output.js';

describe('OutputManager', () => {
  it('renders text lines in text mode', () => {
    const io = createCapturedIO();
    new OutputManager('text', io).success('owner show', { owner: 'alice' }, (data) => [`owner: ${data.owner}`]);

    expect(io.out).toEqual(['owner: alice']);
    expect(io.exitCode).toBeUndefined();
  });

  it('writes a JSON envelope in JSON mode', () => {
    const io = createCapturedIO();
    new OutputManager('json', io).success('owner show', { owner: 'alice' }, () => ['unused']);

    expect(io.out).toHaveLength(1);
    const response: unknown = JSON.parse(io.out[0] ?? '');
    expect(response).toMatchObject({ success: true, command: 'owner show', data: { owner: 'alice' } });
  });

  it('reports errors on stderr with the exit code in text mode', () => {
    const io = createCapturedIO();
    new OutputManager('text', io).error('execute', new InvalidTimeError(3, 9, 17), ExitCodes.CONDITION_FAILED);

    expect(io.out).toEqual([]);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/Error: Hour 3 is outside the business-hour window \[9, 17\]$/);
    expect(io.exitCode).toBe(ExitCodes.CONDITION_FAILED);
  });

  it('reports errors on stdout with the domain code in JSON mode', () => {
    const io = createCapturedIO();
    new OutputManager('json', io).error('execute', new InvalidTimeError(3, 9, 17), ExitCodes.CONDITION_FAILED);

    const response: unknown = JSON.parse(io.out[0] ?? '');
    expect(response).toMatchObject({
      success: false,
      error: { code: 'INVALID_TIME', message: 'Hour 3 is outside the business-hour window [9, 17]' },
    });
    expect(io.exitCode).toBe(ExitCodes.CONDITION_FAILED);
  });
});
