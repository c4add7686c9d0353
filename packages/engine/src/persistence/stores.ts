import type { Result } from 'neverthrow';

import type { EngineNotInitializedError } from '../errors.js';
import type { BatchRecord, EngineState, ListRecordsOptions } from '../types.js';

/**
 * Storage contracts the engine modules depend on. The SQLite repositories
 * implement them; every method reports storage faults as Err, never by throwing.
 */

export interface EngineStateStore {
  /** undefined until initialize() has run */
  get(): Promise<Result<EngineState | undefined, Error>>;
  initialize(owner: string): Promise<Result<{ state: EngineState; created: boolean }, Error>>;
  update(patch: Partial<EngineState>): Promise<Result<EngineState, EngineNotInitializedError | Error>>;
}

export interface SignerStore {
  has(principal: string): Promise<Result<boolean, Error>>;
  /** Resolves to true when the principal was not already present */
  add(principal: string): Promise<Result<boolean, Error>>;
  /** Resolves to true when the principal was present */
  remove(principal: string): Promise<Result<boolean, Error>>;
  list(): Promise<Result<string[], Error>>;
}

export interface BatchRecordStore {
  put(record: BatchRecord): Promise<Result<void, Error>>;
  get(id: number): Promise<Result<BatchRecord | undefined, Error>>;
  list(options?: ListRecordsOptions): Promise<Result<BatchRecord[], Error>>;
}
