import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { BatchRecordStore, EngineStateStore } from '../persistence/stores.js';
import type { BatchRecord, ConditionsMet, ListRecordsOptions } from '../types.js';

/**
 * Read/write view over batch records and the last successful execution height.
 * Records are frozen on the way out and never updated.
 */
export class AuditLedger {
  constructor(
    private readonly records: BatchRecordStore,
    private readonly state: EngineStateStore
  ) {}

  async put(record: BatchRecord): Promise<Result<void, Error>> {
    return this.records.put(record);
  }

  async get(id: number): Promise<Result<BatchRecord | undefined, Error>> {
    const result = await this.records.get(id);
    return result.map((record) => (record ? freezeRecord(record) : undefined));
  }

  async list(options?: ListRecordsOptions): Promise<Result<BatchRecord[], Error>> {
    const result = await this.records.list(options);
    return result.map((records) => records.map(freezeRecord));
  }

  /**
   * Height of the last successful batch; 0 before any success or before initialization.
   */
  async lastExecutionTimestamp(): Promise<Result<number, Error>> {
    const stateResult = await this.state.get();
    if (stateResult.isErr()) return err(stateResult.error);
    return ok(stateResult.value?.lastExecutionTimestamp ?? 0);
  }
}

export function freezeRecord(record: BatchRecord): BatchRecord {
  const conditionsMet: ConditionsMet = [...record.conditionsMet];
  return Object.freeze({ ...record, conditionsMet: Object.freeze(conditionsMet) });
}
