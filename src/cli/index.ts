#!/usr/bin/env node
import { Command } from 'commander';
import { createFetchCommand } from './commands/fetch.js';
import { createGraphCommand } from './commands/graph.js';
import { createReportCommand } from './commands/report.js';
import { createBalanceCommand, createInfoCommand } from './commands/token.js';
import { createTransactionCommand } from './commands/transaction.js';

const program = new Command();

program
  .name('stablescope')
  .description('Page through and decode ERC-20 stablecoin events')
  .version('0.1.0');

program.addCommand(createFetchCommand());
program.addCommand(createGraphCommand());
program.addCommand(createReportCommand());
program.addCommand(createInfoCommand());
program.addCommand(createBalanceCommand());
program.addCommand(createTransactionCommand());

await program.parseAsync();
