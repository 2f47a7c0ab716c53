import { createLogger, Logger } from '../utils/logger.js';
import { loadConfigFile } from './config.js';
import { CommandContext, ContextOverrides, createContext } from './context.js';
import { EXIT_CODES, reportError } from './output.js';

export interface BaseCommandOptions {
  config: string;
  verbose: boolean;
}

export interface TokenDisplay {
  decimals: number;
  symbol: string;
}

/**
 * Loads config, builds the context and maps failures to exit codes. SIGINT
 * aborts the signal handed to `body`; fetches stop before their next page.
 */
export async function runCommand(
  options: BaseCommandOptions,
  body: (context: CommandContext, signal: AbortSignal) => Promise<void>,
  overrides: () => ContextOverrides = () => ({})
): Promise<void> {
  const logger: Logger = createLogger(options.verbose);
  const controller = new AbortController();
  let context: CommandContext | null = null;

  const onSigint = () => {
    logger.info('Received SIGINT, stopping after the current request');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    logger.debug({ configPath: options.config }, 'Loading configuration');
    const config = loadConfigFile(options.config);

    context = createContext(config, logger, overrides());
    await body(context, controller.signal);
    process.exitCode = EXIT_CODES.ok;
  } catch (error) {
    process.exitCode = reportError(logger, error);
  } finally {
    process.off('SIGINT', onSigint);
    context?.close();
  }
}

/**
 * Decimals and symbol from config, falling back to the token contract.
 */
export async function resolveTokenDisplay(context: CommandContext): Promise<TokenDisplay> {
  const { decimals, symbol } = context.config.token;

  if (decimals !== undefined && symbol !== undefined) {
    return { decimals, symbol };
  }

  const info = await context.token.info();
  return { decimals: decimals ?? info.decimals, symbol: symbol ?? info.symbol };
}
