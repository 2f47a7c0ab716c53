import { Command } from 'commander';
import { formatAmount } from '../../export/format.js';
import { resolveBalanceTargets } from '../args.js';
import { toJson, writeOutput } from '../output.js';
import { BaseCommandOptions, runCommand } from '../run.js';

interface TokenCommandOptions extends BaseCommandOptions {
  json: boolean;
}

/**
 * Create the info command
 */
export function createInfoCommand(): Command {
  const command = new Command('info');

  command
    .description('Show token name, symbol, decimals and total supply')
    .option('--json', 'Print JSON', false)
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: TokenCommandOptions) => {
      await runCommand(options, async context => {
        const [info, owner] = await Promise.all([context.token.info(), context.token.owner()]);

        writeOutput(
          options.json
            ? toJson({ ...info, owner })
            : [
                `Token: ${info.name} (${info.symbol})`,
                `Address: ${info.address}`,
                `Decimals: ${info.decimals}`,
                `Total supply: ${formatAmount(info.totalSupply, info.decimals)} ${info.symbol}`,
                `Owner: ${owner === null ? 'none' : context.addressBook.label(owner)}`,
              ].join('\n')
        );
      });
    });

  return command;
}

/**
 * Create the balance command
 */
export function createBalanceCommand(): Command {
  const command = new Command('balance');

  command
    .description('Show token balances of addresses, or of the configured watchlist')
    .argument('[addresses...]', 'Account addresses')
    .option('--json', 'Print JSON', false)
    .option('-c, --config <path>', 'Path to configuration file', './stablescope.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (addresses: string[], options: TokenCommandOptions) => {
      await runCommand(options, async context => {
        const targets = resolveBalanceTargets(addresses, context.config.watchlist);
        const [balances, info] = await Promise.all([
          context.token.balancesOf(targets),
          context.token.info(),
        ]);

        writeOutput(
          options.json
            ? toJson(balances.map(entry => ({ ...entry, decimals: info.decimals, symbol: info.symbol })))
            : balances
                .map(({ address, balance }) =>
                  `${context.addressBook.label(address)}: ${formatAmount(balance, info.decimals)} ${info.symbol}`
                )
                .join('\n')
        );
      });
    });

  return command;
}
