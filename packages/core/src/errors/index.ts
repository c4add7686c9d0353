/**
 * Error hierarchy shared by every package.
 *
 * Domain code never throws across module boundaries. Failures are returned as
 * `Result<T, DomainError | Error>`: `DomainError` subclasses for business-rule
 * outcomes a caller is expected to branch on, plain `Error` for infrastructure faults.
 */

export type ErrorSeverity = 'error' | 'warning';

export interface DomainErrorOptions {
  /** Free-form structured context, surfaced in logs and `toJSON()` */
  context?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base class for all domain errors
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: DomainErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Narrow an unknown failure to a DomainError carrying the given code
 */
export function isDomainError(error: unknown, code?: string): error is DomainError {
  if (!(error instanceof DomainError)) return false;
  return code === undefined || error.code === code;
}
