import { Command } from 'commander';
import { parseUnits } from 'ethers';
import { buildTransferGraph } from '../../analysis/graph.js';
import { formatGraph } from '../../export/summary.js';
import { ValidationError } from '../../utils/errors.js';
import { parseBlockWindow, parseNonNegativeInt, resolveBlockWindow } from '../args.js';
import { parseOutputFormat, toJson, writeOutput } from '../output.js';
import { BaseCommandOptions, resolveTokenDisplay, runCommand } from '../run.js';

interface GraphCommandOptions extends BaseCommandOptions {
  fromBlock?: string;
  toBlock?: string;
  recent?: string;
  minAmount: string;
  maxEdges: string;
  format: string;
  out?: string;
}

function parseTokenAmount(value: string, decimals: number): bigint {
  try {
    return parseUnits(value, decimals);
  } catch {
    throw new ValidationError(`--min-amount must be a decimal token amount, got "${value}"`);
  }
}

/**
 * Create the graph command
 */
export function createGraphCommand(): Command {
  const command = new Command('graph');

  command
    .description('Aggregate transfers into sender -> recipient edges')
    .option('--from-block <number>', 'Starting block number')
    .option('--to-block <number|latest>', 'Ending block number or "latest"')
    .option('--recent <blocks>', 'Use the last N blocks instead of a fixed range')
    .option('--min-amount <amount>', 'Minimum transfer value in token units', '0')
    .option('--max-edges <count>', 'Maximum number of edges to keep', '50')
    .option('-f, --format <format>', 'Output format: table or json', 'table')
    .option('-o, --out <path>', 'Write output to a file instead of stdout')
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: GraphCommandOptions) => {
      await runCommand(options, async (context, signal) => {
        const format = parseOutputFormat(options.format);
        if (format === 'csv') {
          throw new ValidationError('graph supports table or json output');
        }

        const maxEdges = parseNonNegativeInt(options.maxEdges, '--max-edges');
        const display = await resolveTokenDisplay(context);
        const minAmount = parseTokenAmount(options.minAmount, display.decimals);
        const range = await resolveBlockWindow(
          parseBlockWindow(options, context.config.fetch.recent_blocks),
          context.source
        );

        const result = await context.fetcher.fetch(
          context.config.token.address,
          'Transfer',
          range.fromBlock,
          range.toBlock,
          { signal }
        );

        const graph = buildTransferGraph(result.events, { minAmount, maxEdges });

        context.logger.info({
          ...range,
          transfers: result.events.length,
          nodes: graph.nodes.length,
          edges: graph.edges.length,
        }, 'Built transfer graph');

        writeOutput(
          format === 'json'
            ? toJson({ ...range, ...graph })
            : formatGraph(graph, { ...display, addressBook: context.addressBook }),
          options.out
        );
      });
    });

  return command;
}
