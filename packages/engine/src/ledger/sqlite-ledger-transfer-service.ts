import { getErrorMessage } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import { withControlledTransaction } from '@batchpay/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { InvalidInputError } from '../errors.js';
import type { EngineDB } from '../persistence/repositories/base-repository.js';
import { LedgerBalanceRepository } from '../persistence/repositories/ledger-balance-repository.js';
import { TransferError, type TransferService } from '../transfers/transfer-service.js';

const logger = getLogger('SqliteLedger');

class InsufficientFundsSignal extends Error {}

/**
 * Transfer service over the ledger_balances table of the engine database.
 * Every transfer debits and credits inside one SQLite transaction.
 */
export class SqliteLedgerTransferService implements TransferService {
  private readonly balances: LedgerBalanceRepository;

  constructor(private readonly db: EngineDB) {
    this.balances = new LedgerBalanceRepository(db);
  }

  async getBalance(principal: string): Promise<Result<bigint, TransferError>> {
    const result = await this.balances.getBalance(principal);
    return result.mapErr((error) => new TransferError('FAULT', error.message, { cause: error }));
  }

  async transfer(amount: bigint, from: string, to: string): Promise<Result<void, TransferError>> {
    if (amount < 0n) {
      return err(new TransferError('FAULT', `Transfer amount must not be negative, got ${amount}`));
    }

    const result = await withControlledTransaction(
      this.db,
      logger,
      async (trx): Promise<Result<void, Error>> => {
        const repo = new LedgerBalanceRepository(trx);

        const fromBalance = await repo.getBalance(from);
        if (fromBalance.isErr()) return err(fromBalance.error);
        if (fromBalance.value < amount) {
          return err(new InsufficientFundsSignal(`${from} holds ${fromBalance.value}, needs ${amount}`));
        }

        if (from === to) return ok(undefined);

        const toBalance = await repo.getBalance(to);
        if (toBalance.isErr()) return err(toBalance.error);

        const debit = await repo.setBalance(from, fromBalance.value - amount);
        if (debit.isErr()) return err(debit.error);

        return repo.setBalance(to, toBalance.value + amount);
      },
      `Failed to transfer ${amount} from ${from} to ${to}`
    );

    if (result.isErr()) {
      const reason = result.error instanceof InsufficientFundsSignal ? 'INSUFFICIENT_FUNDS' : 'FAULT';
      logger.debug({ from, to, amount, reason }, 'Ledger transfer rejected');
      return err(new TransferError(reason, getErrorMessage(result.error), { context: { from, to } }));
    }

    return ok(undefined);
  }

  /**
   * Credit a principal from outside the ledger (funding for local runs)
   */
  async deposit(principal: string, amount: bigint): Promise<Result<bigint, InvalidInputError | Error>> {
    if (amount <= 0n) {
      return err(new InvalidInputError(`Deposit amount must be positive, got ${amount}`));
    }

    return withControlledTransaction(
      this.db,
      logger,
      async (trx): Promise<Result<bigint, Error>> => {
        const repo = new LedgerBalanceRepository(trx);
        const current = await repo.getBalance(principal);
        if (current.isErr()) return err(current.error);

        const next = current.value + amount;
        const write = await repo.setBalance(principal, next);
        if (write.isErr()) return err(write.error);

        logger.info({ principal, amount, balance: next }, 'Deposited funds');
        return ok(next);
      },
      `Failed to deposit into ${principal}`
    );
  }

  async listBalances(): Promise<Result<{ principal: string; balance: bigint }[], Error>> {
    return this.balances.listBalances();
  }
}
