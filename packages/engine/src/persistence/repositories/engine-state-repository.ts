import { wrapError } from '@batchpay/core';
import type { Selectable } from '@batchpay/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { EngineNotInitializedError } from '../../errors.js';
import type { EngineState } from '../../types.js';
import type { EngineStateTable } from '../schema.js';
import type { EngineStateStore } from '../stores.js';

import { BaseRepository, type EngineDB } from './base-repository.js';

const STATE_ROW_ID = 1;

/**
 * Repository for the single engine_state row
 */
export class EngineStateRepository extends BaseRepository implements EngineStateStore {
  constructor(db: EngineDB) {
    super(db, 'EngineStateRepository');
  }

  async get(): Promise<Result<EngineState | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('engine_state')
        .selectAll()
        .where('id', '=', STATE_ROW_ID)
        .executeTakeFirst();

      return ok(row ? toEngineState(row) : undefined);
    } catch (error) {
      return wrapError(error, 'Failed to load engine state');
    }
  }

  /**
   * Create the state row with its initial owner.
   * Idempotent: an existing row is returned unchanged, whatever owner is passed.
   */
  async initialize(owner: string): Promise<Result<{ state: EngineState; created: boolean }, Error>> {
    try {
      const insert = await this.db
        .insertInto('engine_state')
        .values({
          id: STATE_ROW_ID,
          owner,
          next_batch_id: 1,
          last_execution_timestamp: 0,
          performance_metric: 0,
          updated_at: this.getCurrentDateTimeForDB(),
        })
        .onConflict((oc) => oc.column('id').doNothing())
        .executeTakeFirst();

      const created = (insert.numInsertedOrUpdatedRows ?? 0n) > 0n;

      const stateResult = await this.get();
      if (stateResult.isErr()) return err(stateResult.error);
      if (!stateResult.value) {
        return err(new Error('Engine state row missing after initialization'));
      }

      if (created) {
        this.logger.info({ owner }, 'Initialized engine state');
      } else if (stateResult.value.owner !== owner) {
        this.logger.warn(
          { requestedOwner: owner, owner: stateResult.value.owner },
          'Engine state already initialized with a different owner; keeping the existing one'
        );
      }

      return ok({ state: stateResult.value, created });
    } catch (error) {
      return wrapError(error, 'Failed to initialize engine state');
    }
  }

  async update(patch: Partial<EngineState>): Promise<Result<EngineState, EngineNotInitializedError | Error>> {
    try {
      const result = await this.db
        .updateTable('engine_state')
        .set({
          ...(patch.owner !== undefined && { owner: patch.owner }),
          ...(patch.nextBatchId !== undefined && { next_batch_id: patch.nextBatchId }),
          ...(patch.lastExecutionTimestamp !== undefined && {
            last_execution_timestamp: patch.lastExecutionTimestamp,
          }),
          ...(patch.performanceMetric !== undefined && { performance_metric: patch.performanceMetric }),
          updated_at: this.getCurrentDateTimeForDB(),
        })
        .where('id', '=', STATE_ROW_ID)
        .returningAll()
        .executeTakeFirst();

      if (!result) {
        return err(new EngineNotInitializedError());
      }

      return ok(toEngineState(result));
    } catch (error) {
      return wrapError(error, 'Failed to update engine state');
    }
  }
}

function toEngineState(row: Selectable<EngineStateTable>): EngineState {
  return {
    owner: row.owner,
    nextBatchId: row.next_batch_id,
    lastExecutionTimestamp: row.last_execution_timestamp,
    performanceMetric: row.performance_metric,
  };
}
