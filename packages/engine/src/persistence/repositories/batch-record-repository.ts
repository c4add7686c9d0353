import { formatZodIssues, fromZod, wrapError } from '@batchpay/core';
import type { Insertable, Selectable } from '@batchpay/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { ConditionsMetSchema, type BatchRecord, type ListRecordsOptions } from '../../types.js';
import type { BatchRecordsTable } from '../schema.js';
import type { BatchRecordStore } from '../stores.js';

import { BaseRepository, type EngineDB } from './base-repository.js';

/**
 * Append-only store of batch audit records
 */
export class BatchRecordRepository extends BaseRepository implements BatchRecordStore {
  constructor(db: EngineDB) {
    super(db, 'BatchRecordRepository');
  }

  async put(record: BatchRecord): Promise<Result<void, Error>> {
    try {
      await this.db.insertInto('batch_records').values(toRow(record)).execute();
      this.logger.debug({ batchId: record.id, success: record.success }, 'Stored batch record');
      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to store batch record ${record.id}`);
    }
  }

  async get(id: number): Promise<Result<BatchRecord | undefined, Error>> {
    try {
      const row = await this.db.selectFrom('batch_records').selectAll().where('id', '=', id).executeTakeFirst();
      if (!row) return ok(undefined);
      return toBatchRecord(row);
    } catch (error) {
      return wrapError(error, `Failed to load batch record ${id}`);
    }
  }

  async list(options: ListRecordsOptions = {}): Promise<Result<BatchRecord[], Error>> {
    try {
      let query = this.db.selectFrom('batch_records').selectAll().orderBy('id', 'asc');

      if (options.limit !== undefined) {
        query = query.limit(options.limit);
      }
      if (options.offset !== undefined) {
        // SQLite rejects OFFSET without LIMIT
        query = options.limit === undefined ? query.limit(-1).offset(options.offset) : query.offset(options.offset);
      }

      const rows = await query.execute();
      const records: BatchRecord[] = [];
      for (const row of rows) {
        const record = toBatchRecord(row);
        if (record.isErr()) return err(record.error);
        records.push(record.value);
      }
      return ok(records);
    } catch (error) {
      return wrapError(error, 'Failed to list batch records');
    }
  }
}

function toRow(record: BatchRecord): Insertable<BatchRecordsTable> {
  return {
    id: record.id,
    timestamp: record.timestamp,
    caller: record.caller,
    total_amount: record.totalAmount.toString(),
    success: record.success ? 1 : 0,
    conditions_met: JSON.stringify(record.conditionsMet),
    instruction_count: record.instructionCount,
    failed_instruction_index: record.failedInstructionIndex ?? null,
    failure_reason: record.failureReason ?? null,
    created_at: record.createdAt.toISOString(),
  };
}

function toBatchRecord(row: Selectable<BatchRecordsTable>): Result<BatchRecord, Error> {
  let parsedConditions: unknown;
  try {
    parsedConditions = JSON.parse(row.conditions_met);
  } catch (error) {
    return wrapError(error, `Corrupt conditions_met on batch record ${row.id}`);
  }

  const conditions = fromZod(ConditionsMetSchema, parsedConditions);
  if (conditions.isErr()) {
    return err(new Error(`Corrupt conditions_met on batch record ${row.id}: ${formatZodIssues(conditions.error)}`));
  }

  return ok({
    id: row.id,
    timestamp: row.timestamp,
    caller: row.caller,
    totalAmount: BigInt(row.total_amount),
    success: row.success === 1,
    conditionsMet: conditions.value,
    instructionCount: row.instruction_count,
    failedInstructionIndex: row.failed_instruction_index ?? undefined,
    failureReason: row.failure_reason ?? undefined,
    createdAt: new Date(row.created_at),
  });
}
