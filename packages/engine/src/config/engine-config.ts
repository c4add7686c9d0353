import { formatZodIssues, MicroAmountSchema } from '@batchpay/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { InvalidThresholdError } from '../errors.js';

/** 50,000 whole units in micro-units */
export const DEFAULT_HIGH_VALUE_THRESHOLD = 50_000n * 1_000_000n;

export const EngineConfigSchema = z.object({
  /** Divisor from clock height to hour; see hourOfDay() */
  blocksPerHour: z.number().int().positive().default(144),
  businessHours: z
    .object({
      startHour: z.number().int().min(0).max(23).default(9),
      endHour: z.number().int().min(0).max(23).default(17),
    })
    .default({}),
  /** Batches whose total is strictly above this need an authorized caller and 2+ signers */
  highValueThreshold: MicroAmountSchema.default(DEFAULT_HIGH_VALUE_THRESHOLD),
  /** Caller must hold this percentage of the batch total */
  balanceBufferPercent: z.number().int().positive().default(110),
  maxInstructions: z.number().int().positive().default(50),
  maxSignatures: z.number().int().positive().default(10),
  /** Reject batches whose performance condition is false, instead of only recording it */
  enforcePerformanceGate: z.boolean().default(false),
  /** Reverse already-applied transfers when a later one in the batch fails */
  compensateOnFailure: z.boolean().default(true),
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Parse a partial engine configuration and fill in defaults.
 *
 * Shape errors and inconsistent thresholds are both reported as InvalidThresholdError.
 */
export function loadEngineConfig(input: unknown = {}): Result<EngineConfig, InvalidThresholdError> {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const firstPath = parsed.error.issues[0]?.path.join('.') || 'config';
    return err(new InvalidThresholdError(firstPath, formatZodIssues(parsed.error)));
  }

  const config = parsed.data;

  if (config.businessHours.startHour > config.businessHours.endHour) {
    return err(
      new InvalidThresholdError(
        'businessHours',
        `startHour ${config.businessHours.startHour} is after endHour ${config.businessHours.endHour}`
      )
    );
  }

  if (config.balanceBufferPercent < 100) {
    return err(
      new InvalidThresholdError(
        'balanceBufferPercent',
        `must be at least 100, got ${config.balanceBufferPercent}`
      )
    );
  }

  return ok(config);
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});
