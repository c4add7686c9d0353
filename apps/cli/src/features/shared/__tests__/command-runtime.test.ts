import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { ManualClock } from '@batchpay/engine';
import { resetEnvCache } from '@batchpay/env';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCapturedIO } from '../../../__tests__/test-io.js';
import { CommandContext, runCommand } from '../command-runtime.js';
import { ExitCodes } from '../exit-codes.js';

describe('CommandContext', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(path.join(tmpdir(), 'batchpay-runtime-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('reuses the open engine for the same clock and refuses a different one', async () => {
    const ctx = new CommandContext({ dataDir }, createCapturedIO());
    const clock = ManualClock.create(1440)._unsafeUnwrap();
    const otherClock = ManualClock.create(0)._unsafeUnwrap();

    try {
      const handle = await ctx.engine(clock);

      expect(await ctx.engine(clock)).toBe(handle);
      expect(await ctx.engine()).toBe(handle);
      await expect(ctx.engine(otherClock)).rejects.toThrow('Engine is already open with a different clock');
    } finally {
      await ctx.dispose();
    }
  });
});

describe('runCommand', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvCache();
  });

  it('reports a context that cannot be created without running the command', async () => {
    vi.stubEnv('BATCHPAY_LOG_LEVEL', 'bogus');
    resetEnvCache();
    const io = createCapturedIO();
    let ran = false;

    await runCommand('records list', { json: true }, io, () => {
      ran = true;
      return Promise.resolve();
    });

    expect(ran).toBe(false);
    expect(io.exitCode).toBe(ExitCodes.GENERAL_ERROR);
    expect(io.out).toHaveLength(1);
    const response: unknown = JSON.parse(io.out[0] ?? '');
    expect(response).toMatchObject({ success: false, command: 'records list', error: { code: 'GENERAL_ERROR' } });
  });
});
