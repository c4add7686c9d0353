import type { Command } from 'commander';

import type { CliIO } from '../shared/cli-io.js';
import { runCommand, unwrap } from '../shared/command-runtime.js';
import { parseCommandOptions } from '../shared/parse-options.js';
import { CallerOptionSchema, GlobalOptionsSchema, MetricValueSchema } from '../shared/schemas.js';

const SetMetricOptionsSchema = CallerOptionSchema.extend({ value: MetricValueSchema });

export function registerMetricsCommand(program: Command, io: CliIO): void {
  const metrics = program.command('metrics').description('Performance metric gating batch execution');

  metrics
    .command('set <value>')
    .description('Set the performance metric (owner only)')
    .option('--caller <principal>', 'Principal issuing the change')
    .action(async (value: string, _options: unknown, command: Command) => {
      const options = parseCommandOptions(
        SetMetricOptionsSchema,
        { ...command.optsWithGlobals(), value },
        'metrics set',
        io
      );
      if (!options) return;

      await runCommand('metrics set', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        unwrap(await engine.setPerformanceMetrics(options.caller, options.value));
        ctx.output.success('metrics set', { performanceMetric: options.value }, (data) => [
          `Performance metric set to ${data.performanceMetric}`,
        ]);
      });
    });

  metrics
    .command('show')
    .description('Print the performance metric')
    .action(async (_options: unknown, command: Command) => {
      const options = parseCommandOptions(GlobalOptionsSchema, command.optsWithGlobals(), 'metrics show', io);
      if (!options) return;

      await runCommand('metrics show', options, io, async (ctx) => {
        const { engine } = await ctx.engine();
        const performanceMetric = unwrap(await engine.getPerformanceMetric());
        ctx.output.success('metrics show', { performanceMetric }, (data) => [String(data.performanceMetric)]);
      });
    });
}
