import { wrapError } from '@batchpay/core';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import { BaseRepository, type EngineDB } from './base-repository.js';

/**
 * Balances held by the bundled ledger. A principal without a row has a zero balance.
 */
export class LedgerBalanceRepository extends BaseRepository {
  constructor(db: EngineDB) {
    super(db, 'LedgerBalanceRepository');
  }

  async getBalance(principal: string): Promise<Result<bigint, Error>> {
    try {
      const row = await this.db
        .selectFrom('ledger_balances')
        .select('balance')
        .where('principal', '=', principal)
        .executeTakeFirst();

      return ok(row ? BigInt(row.balance) : 0n);
    } catch (error) {
      return wrapError(error, `Failed to read balance of ${principal}`);
    }
  }

  async setBalance(principal: string, balance: bigint): Promise<Result<void, Error>> {
    const updatedAt = this.getCurrentDateTimeForDB();
    try {
      await this.db
        .insertInto('ledger_balances')
        .values({ principal, balance: balance.toString(), updated_at: updatedAt })
        .onConflict((oc) => oc.column('principal').doUpdateSet({ balance: balance.toString(), updated_at: updatedAt }))
        .execute();

      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to write balance of ${principal}`);
    }
  }

  async listBalances(): Promise<Result<{ principal: string; balance: bigint }[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('ledger_balances')
        .select(['principal', 'balance'])
        .orderBy('principal')
        .execute();

      return ok(rows.map((row) => ({ principal: row.principal, balance: BigInt(row.balance) })));
    } catch (error) {
      return wrapError(error, 'Failed to list balances');
    }
  }
}
