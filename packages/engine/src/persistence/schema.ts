/**
 * Single-row table (id = 1) holding process-wide engine state.
 */
export interface EngineStateTable {
  id: number;
  owner: string;
  next_batch_id: number;
  last_execution_timestamp: number;
  performance_metric: number;
  updated_at: string;
}

export interface AuthorizedSignersTable {
  principal: string;
  added_at: string;
}

/**
 * Batch audit records, append-only. Amounts are decimal TEXT, booleans INTEGER 0/1.
 */
export interface BatchRecordsTable {
  id: number;
  timestamp: number;
  caller: string;
  total_amount: string;
  success: number;
  /** JSON array of four booleans */
  conditions_met: string;
  instruction_count: number;
  failed_instruction_index: number | null;
  failure_reason: string | null;
  created_at: string;
}

/**
 * Balances of the bundled SQLite transfer service
 */
export interface LedgerBalancesTable {
  principal: string;
  balance: string;
  updated_at: string;
}

export interface EngineDatabase {
  engine_state: EngineStateTable;
  authorized_signers: AuthorizedSignersTable;
  batch_records: BatchRecordsTable;
  ledger_balances: LedgerBalancesTable;
}
