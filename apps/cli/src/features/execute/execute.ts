import { formatMicroAmount } from '@batchpay/core';
import { ManualClock, TransferFailedError } from '@batchpay/engine';
import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { CommandFailure, runCommand, unwrap } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { formatBatchRecordDetail, serializeBatchRecord } from '../shared/formatters.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { ExecuteCommandOptionsSchema } from '../shared/schemas.js';

import { loadBatchFile } from './batch-file.js';

export function registerExecuteCommand(program: Command, io: CliIO): void {
  program
    .command('execute')
    .description('Gate, apply and record a batch of transfers from a JSON file')
    .option('--caller <principal>', 'Principal submitting the batch (funds come from this principal)')
    .option('--file <path>', 'Batch file: { "instructions": [...], "signatures": [...] }')
    .option('--height <n>', 'Clock height to execute at (defaults to wall-clock time)')
    .action(async (_options: unknown, command: Command) => {
      await executeBatchCommand(command.optsWithGlobals(), io);
    });
}

async function executeBatchCommand(rawOptions: unknown, io: CliIO): Promise<void> {
  const options = parseCommandOptions(ExecuteCommandOptionsSchema, rawOptions, 'execute', io);
  if (!options) return;

  await runCommand('execute', options, io, async (ctx) => {
    const batchFile = await loadBatchFile(options.file);
    if (batchFile.isErr()) {
      throw new CommandFailure(batchFile.error, ExitCodes.VALIDATION_ERROR);
    }

    const clock = options.height === undefined ? undefined : unwrap(ManualClock.create(options.height));
    const { engine } = await ctx.engine(clock);

    const result = await engine.executeBatchTransfer(
      options.caller,
      batchFile.value.instructions,
      batchFile.value.signatures
    );

    if (result.isErr()) {
      if (result.error instanceof TransferFailedError && !ctx.output.isJsonMode()) {
        io.stderr(`Batch ${result.error.batchId} was recorded as failed; see: batchpay records get ${result.error.batchId}`);
      }
      throw new CommandFailure(result.error);
    }

    ctx.output.success('execute', serializeBatchRecord(result.value), (data) => [
      `Executed batch #${data.id}: ${data.instructionCount} transfers, ${formatMicroAmount(BigInt(data.totalAmount))} total`,
      ...formatBatchRecordDetail(data).slice(1),
    ]);
  });
}
