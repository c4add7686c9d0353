import { formatZodIssues } from '@batchpay/core';
import type { ZodType, ZodTypeDef } from 'zod';

import type { CliIO } from './cli-io.js';
import { ExitCodes } from './exit-codes.js';
import { OutputManager } from './output.js';

/**
 * Validate raw commander options at the CLI boundary. On failure the error is
 * reported with INVALID_ARGS and undefined is returned.
 */
export function parseCommandOptions<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  rawOptions: unknown,
  command: string,
  io: CliIO
): TOutput | undefined {
  const result = schema.safeParse(rawOptions);
  if (result.success) {
    return result.data;
  }

  const json = typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
  new OutputManager(json ? 'json' : 'text', io).error(
    command,
    new Error(formatZodIssues(result.error)),
    ExitCodes.INVALID_ARGS
  );
  return undefined;
}
