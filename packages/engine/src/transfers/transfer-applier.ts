import { getErrorMessage } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';

import type { TransferInstruction } from '../types.js';

import { TransferError, type TransferService } from './transfer-service.js';

const logger = getLogger('TransferApplier');

export type ApplyOutcome =
  | { success: true; applied: readonly TransferInstruction[] }
  | {
      success: false;
      /** Instructions applied before the failure, in order */
      applied: readonly TransferInstruction[];
      failedIndex: number;
      reason: string;
      error: TransferError;
    };

/**
 * Applies a batch's transfers strictly in order and stops at the first failure.
 * A rejected or throwing service call counts as a failure. Nothing is reversed here.
 */
export class TransferApplier {
  constructor(private readonly transferService: TransferService) {}

  async apply(source: string, instructions: readonly TransferInstruction[]): Promise<ApplyOutcome> {
    const applied: TransferInstruction[] = [];

    for (const [index, instruction] of instructions.entries()) {
      const error = await this.transferOne(source, instruction);

      if (error) {
        logger.warn(
          { index, recipient: instruction.recipient, amount: instruction.amount, reason: error.reason },
          `Transfer failed: ${error.message}`
        );
        return { success: false, applied, failedIndex: index, reason: error.message, error };
      }

      applied.push(instruction);
    }

    return { success: true, applied };
  }

  private async transferOne(source: string, instruction: TransferInstruction): Promise<TransferError | undefined> {
    try {
      const result = await this.transferService.transfer(instruction.amount, source, instruction.recipient);
      return result.isErr() ? result.error : undefined;
    } catch (error) {
      return new TransferError('FAULT', getErrorMessage(error, 'Transfer service threw'), { cause: error });
    }
  }
}
