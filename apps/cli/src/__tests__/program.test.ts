import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { resetEnvCache } from '@batchpay/env';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes } from '../features/shared/exit-codes.js';
import { createProgram, runCli } from '../program.js';

import { createCapturedIO, type CapturedIO } from './test-io.js';

// hourOfDay(1440) = 10 with the default 144 heights per hour
const BUSINESS_HEIGHT = '1440';

describe('batchpay CLI', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(path.join(tmpdir(), 'batchpay-cli-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvCache();
    rmSync(dataDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<CapturedIO> {
    const io = createCapturedIO();
    await createProgram(io).parseAsync(['--data-dir', dataDir, ...args], { from: 'user' });
    return io;
  }

  function writeBatch(contents: unknown): string {
    const file = path.join(dataDir, 'batch.json');
    writeFileSync(file, JSON.stringify(contents));
    return file;
  }

  async function setUpFundedEngine(): Promise<void> {
    await run('init', '--owner', 'owner');
    await run('metrics', 'set', '1', '--caller', 'owner');
    await run('ledger', 'deposit', 'alice', '5000000');
  }

  it('initializes the engine database', async () => {
    const io = await run('init', '--owner', 'owner');

    expect(io.exitCode).toBeUndefined();
    expect(io.out).toEqual([
      `Engine ready at ${path.join(dataDir, 'batchpay.db')}`,
      '  owner:      owner',
      '  next batch: 1',
    ]);
  });

  it('executes a batch and records it', async () => {
    await setUpFundedEngine();
    const file = writeBatch({ instructions: [{ recipient: 'bob', amount: '1000000' }] });

    const io = await run('--json', 'execute', '--caller', 'alice', '--file', file, '--height', BUSINESS_HEIGHT);

    expect(io.exitCode).toBeUndefined();
    const response: unknown = JSON.parse(io.out.join('\n'));
    expect(response).toMatchObject({
      success: true,
      command: 'execute',
      data: {
        id: 1,
        timestamp: 1440,
        caller: 'alice',
        totalAmount: '1000000',
        success: true,
        conditionsMet: [true, true, true, true],
        instructionCount: 1,
      },
    });

    const balance = await run('ledger', 'balance', 'bob');
    expect(balance.out).toEqual(['bob balance: 1.000000']);

    const records = await run('records', 'list');
    expect(records.out).toEqual(['#1 OK height=1440 caller=alice total=1.000000 transfers=1']);

    const last = await run('records', 'last-execution');
    expect(last.out).toEqual(['1440']);
  });

  it('exits with CONDITION_FAILED outside business hours', async () => {
    await setUpFundedEngine();
    const file = writeBatch({ instructions: [{ recipient: 'bob', amount: '1000000' }] });

    const io = await run('execute', '--caller', 'alice', '--file', file, '--height', '0');

    expect(io.exitCode).toBe(ExitCodes.CONDITION_FAILED);
    expect(io.err[0]).toMatch(/Error: Hour 0 is outside the business-hour window \[9, 17\]$/);
    expect((await run('records', 'list')).out).toEqual(['No batch records']);
  });

  it('exits with PERMISSION_DENIED when a non-owner changes signers', async () => {
    await run('init', '--owner', 'owner');

    const io = await run('signers', 'add', 'mallory', '--caller', 'mallory');

    expect(io.exitCode).toBe(ExitCodes.PERMISSION_DENIED);
    expect((await run('signers', 'list')).out).toEqual(['No authorized signers']);
  });

  it('lists signers added by the owner', async () => {
    await run('init', '--owner', 'owner');
    await run('signers', 'add', 'carol', '--caller', 'owner');
    await run('signers', 'add', 'alice', '--caller', 'owner');

    expect((await run('signers', 'list')).out).toEqual(['alice', 'carol']);
  });

  it('exits with NOT_FOUND for an unknown record', async () => {
    await run('init', '--owner', 'owner');

    const io = await run('--json', 'records', 'get', '99');

    expect(io.exitCode).toBe(ExitCodes.NOT_FOUND);
    const response: unknown = JSON.parse(io.out.join('\n'));
    expect(response).toMatchObject({ success: false, error: { code: 'NOT_FOUND', message: 'No batch record with id 99' } });
  });

  it('exits with NOT_INITIALIZED before init', async () => {
    const io = await run('owner', 'show');
    expect(io.exitCode).toBe(ExitCodes.NOT_INITIALIZED);
  });

  it('exits with INVALID_ARGS when a required option is missing', async () => {
    const io = await run('init');

    expect(io.exitCode).toBe(ExitCodes.INVALID_ARGS);
    expect(io.err[0]).toMatch(/Error: owner: Required$/);
  });

  it('exits with CONFIG_ERROR for an inconsistent config file', async () => {
    const configFile = path.join(dataDir, 'engine.json');
    writeFileSync(configFile, JSON.stringify({ businessHours: { startHour: 20, endHour: 4 } }));

    const io = await run('--config', configFile, 'init', '--owner', 'owner');

    expect(io.exitCode).toBe(ExitCodes.CONFIG_ERROR);
    expect(io.err[0]).toMatch(/Error: Invalid threshold 'businessHours': startHour 20 is after endHour 4$/);
  });

  it('rejects an empty metric value instead of reading it as zero', async () => {
    await setUpFundedEngine();

    const io = await run('metrics', 'set', '', '--caller', 'owner');

    expect(io.exitCode).toBe(ExitCodes.INVALID_ARGS);
    expect(io.err[0]).toMatch(/Error: value: Metric must be a non-negative integer$/);
    expect((await run('metrics', 'show')).out).toEqual(['1']);
  });

  it('rejects an empty height instead of executing at height zero', async () => {
    await setUpFundedEngine();
    const file = writeBatch({ instructions: [{ recipient: 'bob', amount: '1000000' }] });

    const io = await run('execute', '--caller', 'alice', '--file', file, '--height', '');

    expect(io.exitCode).toBe(ExitCodes.INVALID_ARGS);
    expect(io.err[0]).toMatch(/Error: height: Height must be a non-negative integer$/);
    expect((await run('records', 'list')).out).toEqual(['No batch records']);
  });

  it('reports an invalid environment as a general error', async () => {
    vi.stubEnv('BATCHPAY_LOG_LEVEL', 'bogus');
    resetEnvCache();
    const io = createCapturedIO();

    await createProgram(io).parseAsync(['records', 'list'], { from: 'user' });

    expect(io.exitCode).toBe(ExitCodes.GENERAL_ERROR);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/Error: Environment validation failed: BATCHPAY_LOG_LEVEL: /);
  });
});

describe('runCli', () => {
  it('reports a failure that escapes a command as a general error', async () => {
    const io = createCapturedIO();
    const program = new Command('failing').action(() => {
      throw new Error('boom');
    });

    await runCli(program, [], io, { from: 'user' });

    expect(io.exitCode).toBe(ExitCodes.GENERAL_ERROR);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/Error: boom$/);
  });
});
