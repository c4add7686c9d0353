import path from 'node:path';

import { formatZodIssues } from '@batchpay/core';
import { z } from 'zod';

const envSchema = z.object({
  BATCHPAY_DATA_DIR: z.string().min(1).optional(),
  BATCHPAY_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment record. Throws with one line per invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 * @throws Error if validation fails
 */
function getEnv(): ValidatedEnv {
  validatedEnv ??= parseEnv(process.env);
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env (tests).
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Directory holding the engine database.
 *
 * BATCHPAY_DATA_DIR when set, otherwise `<cwd>/data`.
 */
export function getDataDirectory(): string {
  return getEnv().BATCHPAY_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getLogLevel(): ValidatedEnv['BATCHPAY_LOG_LEVEL'] {
  return getEnv().BATCHPAY_LOG_LEVEL;
}
