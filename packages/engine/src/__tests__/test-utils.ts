import { createSqliteDatabase, IN_MEMORY_DATABASE, runMigrations } from '@batchpay/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { engineMigrations } from '../persistence/migrations/index.js';
import { EngineDataContext } from '../persistence/engine-data-context.js';
import type { EngineDatabase } from '../persistence/schema.js';
import { TransferError, type TransferErrorReason, type TransferService } from '../transfers/transfer-service.js';
import type { TransferInstructionInput } from '../types.js';

/** One whole unit in micro-units */
export const UNIT = 1_000_000n;

/**
 * Create an in-memory EngineDataContext with migrations applied. For use in tests only.
 */
export async function createTestDataContext(): Promise<EngineDataContext> {
  const dbResult = createSqliteDatabase<EngineDatabase>(IN_MEMORY_DATABASE);
  if (dbResult.isErr()) {
    throw dbResult.error;
  }

  const migrationResult = await runMigrations(dbResult.value, engineMigrations);
  if (migrationResult.isErr()) {
    await dbResult.value.destroy();
    throw migrationResult.error;
  }

  return new EngineDataContext(dbResult.value);
}

export interface TransferCall {
  amount: bigint;
  from: string;
  to: string;
}

type FailureMode = { kind: 'error'; reason: TransferErrorReason } | { kind: 'throw' };

/**
 * In-memory transfer service. Records every call and can be told to fail
 * a given call (1-based, counting all transfer calls).
 */
export class FakeTransferService implements TransferService {
  readonly calls: TransferCall[] = [];
  private readonly balances = new Map<string, bigint>();
  private readonly failures = new Map<number, FailureMode>();

  constructor(initial: Record<string, bigint> = {}) {
    for (const [principal, balance] of Object.entries(initial)) {
      this.balances.set(principal, balance);
    }
  }

  balanceOf(principal: string): bigint {
    return this.balances.get(principal) ?? 0n;
  }

  failOnCall(callNumber: number, reason: TransferErrorReason = 'FAULT'): void {
    this.failures.set(callNumber, { kind: 'error', reason });
  }

  throwOnCall(callNumber: number): void {
    this.failures.set(callNumber, { kind: 'throw' });
  }

  getBalance(principal: string): Promise<Result<bigint, TransferError>> {
    return Promise.resolve(ok(this.balanceOf(principal)));
  }

  transfer(amount: bigint, from: string, to: string): Promise<Result<void, TransferError>> {
    this.calls.push({ amount, from, to });

    const failure = this.failures.get(this.calls.length);
    if (failure?.kind === 'throw') {
      return Promise.reject(new Error('ledger unavailable'));
    }
    if (failure?.kind === 'error') {
      return Promise.resolve(err(new TransferError(failure.reason, `injected ${failure.reason.toLowerCase()}`)));
    }

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      return Promise.resolve(err(new TransferError('INSUFFICIENT_FUNDS', `${from} holds ${fromBalance}`)));
    }
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return Promise.resolve(ok(undefined));
  }
}

export function instruction(recipient: string, amount: bigint): TransferInstructionInput {
  return { recipient, amount };
}
