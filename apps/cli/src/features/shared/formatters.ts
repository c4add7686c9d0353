import { formatMicroAmount } from '@batchpay/core';
import type { BatchRecord } from '@batchpay/engine';

const CONDITION_LABELS = ['business-hours', 'high-value-auth', 'balance', 'performance'] as const;

/**
 * JSON-safe view of a batch record (amounts as micro-unit strings)
 */
export function serializeBatchRecord(record: BatchRecord) {
  return {
    id: record.id,
    timestamp: record.timestamp,
    caller: record.caller,
    totalAmount: record.totalAmount.toString(),
    success: record.success,
    conditionsMet: [...record.conditionsMet],
    instructionCount: record.instructionCount,
    failedInstructionIndex: record.failedInstructionIndex,
    failureReason: record.failureReason,
    createdAt: record.createdAt.toISOString(),
  };
}

export type SerializedBatchRecord = ReturnType<typeof serializeBatchRecord>;

export function formatConditions(conditionsMet: readonly boolean[]): string {
  return CONDITION_LABELS.map((label, index) => `${label}=${conditionsMet[index] ? 'yes' : 'no'}`).join(' ');
}

/**
 * One-line summary of a record
 */
export function formatBatchRecordLine(record: SerializedBatchRecord): string {
  const status = record.success ? 'OK' : 'FAILED';
  const amount = formatMicroAmount(BigInt(record.totalAmount));
  const failure =
    record.failedInstructionIndex === undefined
      ? ''
      : ` (instruction ${record.failedInstructionIndex}: ${record.failureReason ?? 'unknown'})`;
  return `#${record.id} ${status} height=${record.timestamp} caller=${record.caller} total=${amount} transfers=${record.instructionCount}${failure}`;
}

export function formatBatchRecordDetail(record: SerializedBatchRecord): string[] {
  return [
    formatBatchRecordLine(record),
    `  conditions: ${formatConditions(record.conditionsMet)}`,
    `  recorded:   ${record.createdAt}`,
  ];
}
