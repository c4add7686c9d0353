import { DomainError } from '@batchpay/core';
import type { Result } from 'neverthrow';

export type TransferErrorReason = 'INSUFFICIENT_FUNDS' | 'FAULT';

/**
 * Failure reported by a transfer service for one value movement
 */
export class TransferError extends DomainError {
  readonly code = 'TRANSFER_ERROR';
  readonly severity = 'warning' as const;

  constructor(
    public readonly reason: TransferErrorReason,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, { context: { reason, ...options?.context }, cause: options?.cause });
  }
}

/**
 * Ledger that holds balances and moves value between principals.
 *
 * Each transfer call is atomic on its own; the engine sequences calls and
 * decides what to do when one fails.
 */
export interface TransferService {
  transfer(amount: bigint, from: string, to: string): Promise<Result<void, TransferError>>;
  getBalance(principal: string): Promise<Result<bigint, TransferError>>;
}
