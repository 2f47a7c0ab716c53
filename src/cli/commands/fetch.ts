import { Command } from 'commander';
import { FetchResult } from '../../core/log-window-fetcher.js';
import { eventsToCsv } from '../../export/csv.js';
import { formatTimestamp } from '../../export/format.js';
import { formatEventTable } from '../../export/table.js';
import { parseBlockWindow, parseEventKind, parsePageSize, parseStrategy, resolveBlockWindow } from '../args.js';
import { CommandContext } from '../context.js';
import { parseOutputFormat, toJson, writeOutput } from '../output.js';
import { BaseCommandOptions, resolveTokenDisplay, runCommand } from '../run.js';

interface FetchCommandOptions extends BaseCommandOptions {
  kind: string;
  fromBlock?: string;
  toBlock?: string;
  recent?: string;
  pageSize?: string;
  strategy?: string;
  format: string;
  out?: string;
  timestamps: boolean;
}

function renderJson(
  context: CommandContext,
  result: FetchResult,
  range: { fromBlock: number; toBlock: number },
  timestamps?: ReadonlyMap<number, number>
): string {
  return toJson({
    contractAddress: context.config.token.address,
    ...range,
    pages: result.pages,
    events: result.events.map(event => ({
      ...event,
      ...(timestamps && { timestamp: formatTimestamp(timestamps.get(event.blockNumber)) }),
    })),
    failures: result.failures.map(failure => ({
      message: failure.message,
      blockNumber: failure.blockNumber,
      transactionHash: failure.transactionHash,
      logIndex: failure.logIndex,
    })),
  });
}

/**
 * Create the fetch command
 */
export function createFetchCommand(): Command {
  const command = new Command('fetch');

  command
    .description('Fetch and decode token events over a block range')
    .option('-k, --kind <kind>', 'Event kind: Transfer, Mint, Burn or Approval', 'Transfer')
    .option('--from-block <number>', 'Starting block number')
    .option('--to-block <number|latest>', 'Ending block number or "latest"')
    .option('--recent <blocks>', 'Fetch the last N blocks instead of a fixed range')
    .option('--page-size <blocks>', 'Blocks per eth_getLogs call')
    .option('--strategy <strategy>', 'Range limit handling: adaptive or fixed')
    .option('-f, --format <format>', 'Output format: table, csv or json', 'table')
    .option('-o, --out <path>', 'Write output to a file instead of stdout')
    .option('--timestamps', 'Resolve block timestamps', false)
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: FetchCommandOptions) => {
      await runCommand(options, async (context, signal) => {
        const kind = parseEventKind(options.kind);
        const format = parseOutputFormat(options.format);
        const window = parseBlockWindow(options, context.config.fetch.recent_blocks);
        const range = await resolveBlockWindow(window, context.source);

        context.logger.info({ kind, ...range }, 'Fetching events');

        const result = await context.fetcher.fetch(
          context.config.token.address,
          kind,
          range.fromBlock,
          range.toBlock,
          { signal }
        );

        if (result.failures.length > 0) {
          context.logger.warn(
            { failureCount: result.failures.length },
            'Some logs did not match the configured event layout'
          );
        }

        const timestamps = options.timestamps
          ? await context.clock.resolve(result.events.map(event => event.blockNumber))
          : undefined;

        if (format === 'json') {
          writeOutput(renderJson(context, result, range, timestamps), options.out);
          return;
        }

        const display = await resolveTokenDisplay(context);

        if (format === 'csv') {
          writeOutput(eventsToCsv(result.events, { decimals: display.decimals, timestamps }), options.out);
          return;
        }

        const table = result.events.length === 0
          ? `No ${kind} events in blocks ${range.fromBlock}-${range.toBlock}`
          : formatEventTable(result.events, {
              ...display,
              addressBook: context.addressBook,
              timestamps,
            });
        writeOutput(table, options.out);
      }, () => ({
        pageSize: options.pageSize === undefined ? undefined : parsePageSize(options.pageSize),
        strategy: options.strategy === undefined ? undefined : parseStrategy(options.strategy),
      }));
    });

  return command;
}
