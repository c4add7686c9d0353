import { wrapError } from '@batchpay/core';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { SignerStore } from '../stores.js';

import { BaseRepository, type EngineDB } from './base-repository.js';

export class SignerRepository extends BaseRepository implements SignerStore {
  constructor(db: EngineDB) {
    super(db, 'SignerRepository');
  }

  async has(principal: string): Promise<Result<boolean, Error>> {
    try {
      const row = await this.db
        .selectFrom('authorized_signers')
        .select('principal')
        .where('principal', '=', principal)
        .executeTakeFirst();

      return ok(row !== undefined);
    } catch (error) {
      return wrapError(error, `Failed to look up signer ${principal}`);
    }
  }

  async add(principal: string): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .insertInto('authorized_signers')
        .values({ principal, added_at: this.getCurrentDateTimeForDB() })
        .onConflict((oc) => oc.column('principal').doNothing())
        .executeTakeFirst();

      return ok((result.numInsertedOrUpdatedRows ?? 0n) > 0n);
    } catch (error) {
      return wrapError(error, `Failed to add signer ${principal}`);
    }
  }

  async remove(principal: string): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .deleteFrom('authorized_signers')
        .where('principal', '=', principal)
        .executeTakeFirst();

      return ok(result.numDeletedRows > 0n);
    } catch (error) {
      return wrapError(error, `Failed to remove signer ${principal}`);
    }
  }

  async list(): Promise<Result<string[], Error>> {
    try {
      const rows = await this.db.selectFrom('authorized_signers').select('principal').orderBy('principal').execute();
      return ok(rows.map((row) => row.principal));
    } catch (error) {
      return wrapError(error, 'Failed to list signers');
    }
  }
}
