import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { EngineConfig } from '../config/engine-config.js';
import {
  InsufficientBalanceError,
  InvalidTimeError,
  PerformanceGateClosedError,
  UnauthorizedError,
  type BatchGateError,
} from '../errors.js';

import type { ConditionEvaluation, ConditionInputs } from './condition-evaluator.js';

export interface GateContext {
  caller: string;
  inputs: ConditionInputs;
  evaluation: ConditionEvaluation;
}

/**
 * Turn an evaluation into the first gating error, checking business hours,
 * then high-value authorization, then balance. The performance condition is
 * only asserted when `enforcePerformanceGate` is set.
 */
export function assertConditions(
  { caller, inputs, evaluation }: GateContext,
  config: Pick<EngineConfig, 'businessHours' | 'enforcePerformanceGate'>
): Result<void, BatchGateError> {
  const [businessHours, highValueAuthorization, balanceSufficiency, performanceGate] = evaluation.conditionsMet;

  if (!businessHours) {
    return err(new InvalidTimeError(evaluation.hourOfDay, config.businessHours.startHour, config.businessHours.endHour));
  }

  if (!highValueAuthorization) {
    const reason = inputs.callerIsAuthorizedSigner
      ? `high-value batch needs more than one distinct signature, got ${inputs.signatureCount}`
      : 'high-value batch needs an authorized signer as caller';
    return err(new UnauthorizedError('execute high-value batch', caller, reason));
  }

  if (!balanceSufficiency) {
    return err(new InsufficientBalanceError(inputs.availableBalance, evaluation.requiredBalance));
  }

  if (config.enforcePerformanceGate && !performanceGate) {
    return err(new PerformanceGateClosedError(inputs.performanceMetric));
  }

  return ok(undefined);
}
