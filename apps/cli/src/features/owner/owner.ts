import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { runCommand, unwrap } from '../shared/command-runtime.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { CallerOptionSchema, GlobalOptionsSchema } from '../shared/schemas.js';

export function registerOwnerCommand(program: Command, io: CliIO): void {
  const owner = program.command('owner').description('Inspect or transfer engine ownership');

  owner
    .command('show')
    .description('Print the current owner')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(GlobalOptionsSchema, command.optsWithGlobals(), 'owner show', io);
      if (!options) return;

      await runCommand('owner show', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const current = unwrap(await engine.getOwner());
        ctx.output.success('owner show', { owner: current }, (data) => [data.owner]);
      });
    });

  owner
    .command('set <newOwner>')
    .description('Hand ownership to another principal (owner only)')
    .option('--caller <principal>', 'Principal issuing the change')
    .action(async (newOwner: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(CallerOptionSchema, command.optsWithGlobals(), 'owner set', io);
      if (!options) return;

      await runCommand('owner set', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        unwrap(await engine.setContractOwner(options.caller, newOwner));
        ctx.output.success('owner set', { owner: newOwner.trim() }, (data) => [`Owner is now ${data.owner}`]);
      });
    });
}
