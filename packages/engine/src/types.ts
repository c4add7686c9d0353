import { MicroAmountSchema, PrincipalSchema } from '@batchpay/core';
import { z } from 'zod';

export const TransferInstructionSchema = z.object({
  recipient: PrincipalSchema,
  amount: MicroAmountSchema,
  /**
   * Accepted and carried for callers that set it. Gating looks at the batch
   * total, never at this flag.
   */
  requiresHighValueCheck: z.boolean().default(false),
});

export type TransferInstruction = z.output<typeof TransferInstructionSchema>;
export type TransferInstructionInput = z.input<typeof TransferInstructionSchema>;

/**
 * Outcome of each gating condition, in the fixed order stored on a BatchRecord:
 * business hours, high-value authorization, balance sufficiency, performance gate.
 */
export type ConditionsMet = readonly [
  businessHours: boolean,
  highValueAuthorization: boolean,
  balanceSufficiency: boolean,
  performanceGate: boolean,
];

export const ConditionsMetSchema = z.tuple([z.boolean(), z.boolean(), z.boolean(), z.boolean()]);

/**
 * Audit record of one batch that reached transfer execution.
 */
export interface BatchRecord {
  readonly id: number;
  /** Clock height at execution */
  readonly timestamp: number;
  readonly caller: string;
  readonly totalAmount: bigint;
  readonly success: boolean;
  readonly conditionsMet: ConditionsMet;
  readonly instructionCount: number;
  /** Zero-based index of the instruction whose transfer failed */
  readonly failedInstructionIndex?: number | undefined;
  readonly failureReason?: string | undefined;
  readonly createdAt: Date;
}

export interface EngineState {
  owner: string;
  nextBatchId: number;
  lastExecutionTimestamp: number;
  performanceMetric: number;
}

export interface ListRecordsOptions {
  limit?: number | undefined;
  offset?: number | undefined;
}
