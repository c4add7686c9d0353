import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { runCommand, unwrap } from '../shared/command-runtime.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { CallerOptionSchema, GlobalOptionsSchema } from '../shared/schemas.js';

export function registerSignersCommand(program: Command, io: CliIO): void {
  const signers = program.command('signers').description('Manage authorized signers for high-value batches');

  signers
    .command('add <signer>')
    .description('Authorize a signer (owner only)')
    .option('--caller <principal>', 'Principal issuing the change')
    .action(async (signer: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(CallerOptionSchema, command.optsWithGlobals(), 'signers add', io);
      if (!options) return;

      await runCommand('signers add', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        unwrap(await engine.addAuthorizedSigner(options.caller, signer));
        ctx.output.success('signers add', { signer: signer.trim() }, (data) => [`Authorized ${data.signer}`]);
      });
    });

  signers
    .command('remove <signer>')
    .description('Revoke a signer (owner only)')
    .option('--caller <principal>', 'Principal issuing the change')
    .action(async (signer: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(CallerOptionSchema, command.optsWithGlobals(), 'signers remove', io);
      if (!options) return;

      await runCommand('signers remove', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        unwrap(await engine.removeAuthorizedSigner(options.caller, signer));
        ctx.output.success('signers remove', { signer: signer.trim() }, (data) => [`Revoked ${data.signer}`]);
      });
    });

  signers
    .command('list')
    .description('List authorized signers')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(GlobalOptionsSchema, command.optsWithGlobals(), 'signers list', io);
      if (!options) return;

      await runCommand('signers list', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const list = unwrap(await engine.listAuthorizedSigners());
        ctx.output.success('signers list', { signers: list }, (data) =>
          data.signers.length === 0 ? ['No authorized signers'] : data.signers
        );
      });
    });
}
