import { MicroAmountSchema, PrincipalSchema } from '@batchpay/core';
import { z } from 'zod';

/**
 * Options accepted by every command (declared on the root program)
 */
export const GlobalOptionsSchema = z.object({
  dataDir: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const CallerOptionSchema = GlobalOptionsSchema.extend({
  caller: PrincipalSchema,
});

export const InitCommandOptionsSchema = GlobalOptionsSchema.extend({
  owner: PrincipalSchema,
});

/**
 * Unsigned decimal integer given on the command line. Empty and signed values are rejected.
 */
function integerArgument(label: string) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform(Number)
    .pipe(z.number().safe(`${label} is too large`));
}

export const MetricValueSchema = integerArgument('Metric');

export const DepositArgsSchema = z.object({
  principal: PrincipalSchema,
  amount: MicroAmountSchema,
});

export const ExecuteCommandOptionsSchema = CallerOptionSchema.extend({
  file: z.string().min(1, 'Batch file path is required'),
  height: integerArgument('Height').optional(),
});

export const RecordIdSchema = integerArgument('Record id').pipe(
  z.number().positive('Record id must be a positive integer')
);

export const RecordsListOptionsSchema = GlobalOptionsSchema.extend({
  limit: integerArgument('Limit').pipe(z.number().positive('Limit must be positive')).optional(),
  offset: integerArgument('Offset').optional(),
});

/**
 * Batch file: instructions as JSON, amounts in micro-units as strings or integers
 */
export const BatchFileSchema = z.object({
  instructions: z.array(
    z.object({
      recipient: z.string(),
      amount: z.union([z.string(), z.number()]),
      requiresHighValueCheck: z.boolean().optional(),
    })
  ),
  signatures: z.array(z.string()).default([]),
});

export type BatchFile = z.infer<typeof BatchFileSchema>;
