import { getErrorMessage } from '@batchpay/core';
import { getLogger } from '@batchpay/logger';
import { Command, type ParseOptions } from 'commander';

import { registerExecuteCommand } from './features/execute/execute.js';
import { registerInitCommand } from './features/init/init.js';
import { registerLedgerCommand } from './features/ledger/ledger.js';
import { registerMetricsCommand } from './features/metrics/metrics.js';
import { registerOwnerCommand } from './features/owner/owner.js';
import { registerRecordsCommand } from './features/records/records.js';
import { processIO, type CliIO } from './features/shared/cli-io.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { OutputManager } from './features/shared/output.js';
import { registerSignersCommand } from './features/signers/signers.js';

const logger = getLogger('CLI');

export const CLI_VERSION = '0.1.0';

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('batchpay')
    .description('Conditional, all-or-nothing batch transfers with an audit trail')
    .version(CLI_VERSION)
    .option('--data-dir <dir>', 'Directory holding batchpay.db (default: $BATCHPAY_DATA_DIR or ./data)')
    .option('--config <file>', 'Engine configuration JSON file')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log at BATCHPAY_LOG_LEVEL instead of warnings only');

  registerInitCommand(program, io);
  registerOwnerCommand(program, io);
  registerSignersCommand(program, io);
  registerMetricsCommand(program, io);
  registerLedgerCommand(program, io);
  registerExecuteCommand(program, io);
  registerRecordsCommand(program, io);

  return program;
}

/**
 * Parse and run a program. Anything that escapes a command's own error handling
 * is reported as a general error instead of rejecting.
 */
export async function runCli(
  program: Command,
  argv: readonly string[],
  io: CliIO = processIO,
  parseOptions?: ParseOptions
): Promise<void> {
  try {
    await program.parseAsync(argv, parseOptions);
  } catch (error) {
    logger.error({ error }, 'CLI failed');
    const output = new OutputManager(argv.includes('--json') ? 'json' : 'text', io);
    output.error(program.name(), new Error(getErrorMessage(error, 'CLI failed')), ExitCodes.GENERAL_ERROR);
  }
}
