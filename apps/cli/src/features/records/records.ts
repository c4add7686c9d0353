import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { CommandFailure, runCommand, unwrap } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { formatBatchRecordDetail, formatBatchRecordLine, serializeBatchRecord } from '../shared/formatters.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { GlobalOptionsSchema, RecordIdSchema, RecordsListOptionsSchema } from '../shared/schemas.js';

const GetRecordOptionsSchema = GlobalOptionsSchema.extend({ id: RecordIdSchema });

export function registerRecordsCommand(program: Command, io: CliIO): void {
  const records = program.command('records').description('Audit records of executed batches');

  records
    .command('get <id>')
    .description('Show one batch record')
    .action(async (id: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(
        GetRecordOptionsSchema,
        { ...command.optsWithGlobals(), id },
        'records get',
        io
      );
      if (!options) return;

      await runCommand('records get', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const record = unwrap(await engine.getTransferRecord(options.id));
        if (!record) {
          throw new CommandFailure(new Error(`No batch record with id ${options.id}`), ExitCodes.NOT_FOUND);
        }
        ctx.output.success('records get', serializeBatchRecord(record), formatBatchRecordDetail);
      });
    });

  records
    .command('list')
    .description('List batch records in id order')
    .option('--limit <n>', 'Maximum number of records')
    .option('--offset <n>', 'Records to skip')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(RecordsListOptionsSchema, command.optsWithGlobals(), 'records list', io);
      if (!options) return;

      await runCommand('records list', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const list = unwrap(await engine.listTransferRecords({ limit: options.limit, offset: options.offset }));
        ctx.output.success('records list', { records: list.map(serializeBatchRecord) }, (data) =>
          data.records.length === 0 ? ['No batch records'] : data.records.map(formatBatchRecordLine)
        );
      });
    });

  records
    .command('last-execution')
    .description('Height of the last successful batch (0 when none)')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(GlobalOptionsSchema, command.optsWithGlobals(), 'records last-execution', io);
      if (!options) return;

      await runCommand('records last-execution', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const lastExecution = unwrap(await engine.getLastExecution());
        ctx.output.success('records last-execution', { lastExecution }, (data) => [String(data.lastExecution)]);
      });
    });
}
