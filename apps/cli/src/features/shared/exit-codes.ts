/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Batch record, file or other resource not found */
  NOT_FOUND: 4,

  /** Database error */
  DATABASE_ERROR: 7,

  /** Batch or value failed validation */
  VALIDATION_ERROR: 8,

  /** Engine configuration is invalid */
  CONFIG_ERROR: 11,

  /** Caller lacks the owner role or signer authorization */
  PERMISSION_DENIED: 13,

  /** Batch rejected by a gating condition (time window, balance, performance) */
  CONDITION_FAILED: 14,

  /** A transfer failed after gating passed; the failed batch was recorded */
  TRANSFER_FAILED: 15,

  /** Engine state has not been initialized with an owner */
  NOT_INITIALIZED: 16,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
