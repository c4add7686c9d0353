import { hourOfDay } from '../clock/clock.js';
import type { EngineConfig } from '../config/engine-config.js';
import type { ConditionsMet, TransferInstruction } from '../types.js';

export interface ConditionInputs {
  currentHeight: number;
  totalAmount: bigint;
  availableBalance: bigint;
  callerIsAuthorizedSigner: boolean;
  /** Number of distinct principals in the signature set */
  signatureCount: number;
  performanceMetric: number;
}

export type ConditionConfig = Pick<
  EngineConfig,
  'blocksPerHour' | 'businessHours' | 'highValueThreshold' | 'balanceBufferPercent'
>;

export interface ConditionEvaluation {
  conditionsMet: ConditionsMet;
  /** True when all four conditions hold */
  accepted: boolean;
  hourOfDay: number;
  requiredBalance: bigint;
  isHighValue: boolean;
}

export function sumInstructionAmounts(instructions: readonly Pick<TransferInstruction, 'amount'>[]): bigint {
  return instructions.reduce((total, instruction) => total + instruction.amount, 0n);
}

export function countDistinctSignatures(signatures: readonly string[]): number {
  return new Set(signatures).size;
}

/**
 * Balance the caller must hold for a batch: total * bufferPercent / 100, truncated.
 */
export function requiredBalanceFor(totalAmount: bigint, balanceBufferPercent: number): bigint {
  return (totalAmount * BigInt(balanceBufferPercent)) / 100n;
}

/**
 * Evaluate every gating condition. Pure; nothing is short-circuited, so the
 * returned vector is complete even when an early condition fails.
 */
export function evaluateConditions(inputs: ConditionInputs, config: ConditionConfig): ConditionEvaluation {
  const hour = hourOfDay(inputs.currentHeight, config.blocksPerHour);
  const businessHours = hour >= config.businessHours.startHour && hour <= config.businessHours.endHour;

  const isHighValue = inputs.totalAmount > config.highValueThreshold;
  const highValueAuthorization = isHighValue
    ? inputs.callerIsAuthorizedSigner && inputs.signatureCount > 1
    : true;

  const requiredBalance = requiredBalanceFor(inputs.totalAmount, config.balanceBufferPercent);
  const balanceSufficiency = inputs.availableBalance >= requiredBalance;

  const performanceGate = inputs.performanceMetric > 0;

  const conditionsMet: ConditionsMet = [businessHours, highValueAuthorization, balanceSufficiency, performanceGate];

  return {
    conditionsMet,
    accepted: conditionsMet.every(Boolean),
    hourOfDay: hour,
    requiredBalance,
    isHighValue,
  };
}
