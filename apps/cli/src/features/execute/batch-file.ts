import { readFile } from 'node:fs/promises';

import { formatZodIssues, wrapError } from '@batchpay/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BatchFileSchema, type BatchFile } from '../shared/schemas.js';

/**
 * Parse batch file contents. Amount checks and size limits are left to the engine.
 */
export function parseBatchFile(contents: string, source = 'batch file'): Result<BatchFile, Error> {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    return wrapError(error, `Invalid JSON in ${source}`);
  }

  const parsed = BatchFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new Error(`Invalid ${source}: ${formatZodIssues(parsed.error)}`));
  }
  return ok(parsed.data);
}

export async function loadBatchFile(filePath: string): Promise<Result<BatchFile, Error>> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    return wrapError(error, `Failed to read batch file ${filePath}`);
  }
  return parseBatchFile(contents, filePath);
}
