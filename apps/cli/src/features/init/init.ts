import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { runCommand, unwrap } from '../shared/command-runtime.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { InitCommandOptionsSchema } from '../shared/schemas.js';

export function registerInitCommand(program: Command, io: CliIO): void {
  program
    .command('init')
    .description('Create the engine database and set its first owner')
    .option('--owner <principal>', 'Initial owner')
    .action(async (_options: unknown, command: Command) => {
      await executeInitCommand(command.optsWithGlobals(), io);
    });
}

async function executeInitCommand(rawOptions: unknown, io: CliIO): Promise<void> {
  const options = parseCommandOptions(InitCommandOptionsSchema, rawOptions, 'init', io);
  if (!options) return;

  await runCommand('init', options, io, async (ctx) => {
    const { engine } = await ctx.engine();
    const state = unwrap(await engine.initialize(options.owner));

    ctx.output.success(
      'init',
      { ...state, databasePath: ctx.databasePath },
      (data) => [
        `Engine ready at ${data.databasePath}`,
        `  owner:      ${data.owner}`,
        `  next batch: ${data.nextBatchId}`,
      ]
    );
  });
}
