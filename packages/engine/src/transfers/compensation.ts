import { getErrorMessage } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';

import type { TransferInstruction } from '../types.js';

import type { TransferService } from './transfer-service.js';

const logger = getLogger('Compensation');

export interface CompensationFailure {
  /** Index of the instruction within the applied list */
  index: number;
  recipient: string;
  amount: bigint;
  reason: string;
}

export interface CompensationResult {
  compensated: boolean;
  failures: CompensationFailure[];
}

/**
 * Reverse already-applied transfers, last first, moving each amount from its
 * recipient back to the source. Every reversal is attempted even after one fails.
 */
export async function compensateTransfers(
  transferService: TransferService,
  source: string,
  applied: readonly TransferInstruction[]
): Promise<CompensationResult> {
  const failures: CompensationFailure[] = [];

  for (const [index, instruction] of [...applied.entries()].reverse()) {
    let reason: string | undefined;
    try {
      const result = await transferService.transfer(instruction.amount, instruction.recipient, source);
      if (result.isErr()) reason = result.error.message;
    } catch (error) {
      reason = getErrorMessage(error, 'Transfer service threw');
    }

    if (reason !== undefined) {
      failures.push({ index, recipient: instruction.recipient, amount: instruction.amount, reason });
    }
  }

  if (failures.length > 0) {
    logger.error({ source, failures }, `Failed to reverse ${failures.length} of ${applied.length} applied transfers`);
  } else if (applied.length > 0) {
    logger.info({ source, reversed: applied.length }, 'Reversed applied transfers');
  }

  return { compensated: failures.length === 0, failures };
}
