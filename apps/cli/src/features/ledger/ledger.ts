import { formatMicroAmount, PrincipalSchema } from '@batchpay/core';
import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { runCommand, unwrap } from '../shared/command-runtime.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { DepositArgsSchema, GlobalOptionsSchema } from '../shared/schemas.js';

const DepositOptionsSchema = GlobalOptionsSchema.merge(DepositArgsSchema);
const BalanceOptionsSchema = GlobalOptionsSchema.extend({ principal: PrincipalSchema });

/**
 * Commands for the bundled ledger the engine transfers through
 */
export function registerLedgerCommand(program: Command, io: CliIO): void {
  const ledger = program.command('ledger').description('Balances held by the bundled ledger (micro-units)');

  ledger
    .command('deposit <principal> <amount>')
    .description('Credit a principal with an amount in micro-units')
    .action(async (principal: string, amount: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(
        DepositOptionsSchema,
        { ...command.optsWithGlobals(), principal, amount },
        'ledger deposit',
        io
      );
      if (!options) return;

      await runCommand('ledger deposit', options, io, async (ctx) => {
        const handle = await ctx.engine();
        const balance = unwrap(await handle.ledger.deposit(options.principal, options.amount));
        ctx.output.success(
          'ledger deposit',
          { principal: options.principal, balance: balance.toString() },
          (data) => [`${data.principal} balance: ${formatMicroAmount(BigInt(data.balance))}`]
        );
      });
    });

  ledger
    .command('balance <principal>')
    .description('Print the balance of a principal')
    .action(async (principal: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(
        BalanceOptionsSchema,
        { ...command.optsWithGlobals(), principal },
        'ledger balance',
        io
      );
      if (!options) return;

      await runCommand('ledger balance', options, io, async (ctx) => {
        const handle = await ctx.engine();
        const balance = unwrap(await handle.ledger.getBalance(options.principal));
        ctx.output.success(
          'ledger balance',
          { principal: options.principal, balance: balance.toString() },
          (data) => [`${data.principal} balance: ${formatMicroAmount(BigInt(data.balance))}`]
        );
      });
    });

  ledger
    .command('list')
    .description('List every balance')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(GlobalOptionsSchema, command.optsWithGlobals(), 'ledger list', io);
      if (!options) return;

      await runCommand('ledger list', options, io, async (ctx) => {
        const handle = await ctx.engine();
        const balances = unwrap(await handle.ledger.listBalances());
        ctx.output.success(
          'ledger list',
          { balances: balances.map((entry) => ({ principal: entry.principal, balance: entry.balance.toString() })) },
          (data) =>
            data.balances.length === 0
              ? ['No balances']
              : data.balances.map((entry) => `${entry.principal} ${formatMicroAmount(BigInt(entry.balance))}`)
        );
      });
    });
}
