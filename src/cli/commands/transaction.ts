import { Command } from 'commander';
import { formatTransaction } from '../../export/summary.js';
import { ProviderError } from '../../utils/errors.js';
import { toJson, writeOutput } from '../output.js';
import { BaseCommandOptions, runCommand } from '../run.js';

interface TransactionCommandOptions extends BaseCommandOptions {
  json: boolean;
}

/**
 * Create the tx command
 */
export function createTransactionCommand(): Command {
  const command = new Command('tx');

  command
    .description('Look up a transaction: status, gas used and fee')
    .argument('<hash>', 'Transaction hash')
    .option('--json', 'Print JSON', false)
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (hash: string, options: TransactionCommandOptions) => {
      await runCommand(options, async context => {
        const details = await context.transactions.lookup(hash);

        if (!details) {
          throw new ProviderError(`Transaction ${hash} not found`, { reason: 'unknown' });
        }

        writeOutput(options.json ? toJson(details) : formatTransaction(details, context.addressBook));
      });
    });

  return command;
}
