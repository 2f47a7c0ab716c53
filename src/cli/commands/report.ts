import { Command } from 'commander';
import { buildActivityReport, EventsByKind } from '../../analysis/report.js';
import { formatReport } from '../../export/summary.js';
import { ValidationError } from '../../utils/errors.js';
import { parseBlockWindow, resolveBlockWindow } from '../args.js';
import { parseOutputFormat, toJson, writeOutput } from '../output.js';
import { BaseCommandOptions, resolveTokenDisplay, runCommand } from '../run.js';

interface ReportCommandOptions extends BaseCommandOptions {
  fromBlock?: string;
  toBlock?: string;
  recent?: string;
  format: string;
  out?: string;
}

/**
 * Create the report command
 */
export function createReportCommand(): Command {
  const command = new Command('report');

  command
    .description('Summarise transfers, supply changes and approvals over a block range')
    .option('--from-block <number>', 'Starting block number')
    .option('--to-block <number|latest>', 'Ending block number or "latest"')
    .option('--recent <blocks>', 'Use the last N blocks instead of a fixed range')
    .option('-f, --format <format>', 'Output format: table or json', 'table')
    .option('-o, --out <path>', 'Write output to a file instead of stdout')
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: ReportCommandOptions) => {
      await runCommand(options, async (context, signal) => {
        const format = parseOutputFormat(options.format);
        if (format === 'csv') {
          throw new ValidationError('report supports table or json output');
        }

        const range = await resolveBlockWindow(
          parseBlockWindow(options, context.config.fetch.recent_blocks),
          context.source
        );
        const address = context.config.token.address;
        const fetchKind = async (kind: keyof EventsByKind) =>
          (await context.fetcher.fetch(address, kind, range.fromBlock, range.toBlock, { signal })).events;

        const events: EventsByKind = {
          Transfer: await fetchKind('Transfer'),
          Mint: await fetchKind('Mint'),
          Burn: await fetchKind('Burn'),
          Approval: await fetchKind('Approval'),
        };

        const report = buildActivityReport(events, range);

        if (format === 'json') {
          writeOutput(toJson(report), options.out);
          return;
        }

        const display = await resolveTokenDisplay(context);
        writeOutput(formatReport(report, { ...display, addressBook: context.addressBook }), options.out);
      });
    });

  return command;
}
