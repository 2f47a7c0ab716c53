import * as fs from 'node:fs';
import {
  ConfigError,
  FetchAbortedError,
  FileSystemError,
  ProviderError,
  ValidationError,
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const OUTPUT_FORMATS = ['table', 'csv', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new ValidationError(`--format must be one of ${OUTPUT_FORMATS.join(', ')}, got "${value}"`);
  }
  return format;
}

/**
 * JSON with bigints written as decimal strings
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, entry: unknown) => (typeof entry === 'bigint' ? entry.toString() : entry), 2);
}

export function writeOutput(content: string, outPath?: string): void {
  const text = content.endsWith('\n') ? content : `${content}\n`;

  if (!outPath) {
    process.stdout.write(text);
    return;
  }

  try {
    fs.writeFileSync(outPath, text, 'utf-8');
  } catch (error) {
    throw new FileSystemError(
      `Failed to write output to ${outPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  provider: 2,
  fileSystem: 3,
  aborted: 130,
} as const;

/**
 * Logs a command failure and returns the exit code for it.
 */
export function reportError(logger: Logger, error: unknown): number {
  if (error instanceof ConfigError) {
    logger.error({ error: error.message }, 'Configuration error');
    return EXIT_CODES.usage;
  }
  if (error instanceof ValidationError) {
    logger.error({ error: error.message }, 'Invalid arguments');
    return EXIT_CODES.usage;
  }
  if (error instanceof ProviderError) {
    logger.error({
      error: error.message,
      reason: error.reason,
      fromBlock: error.fromBlock,
      toBlock: error.toBlock,
    }, 'RPC provider error');
    return EXIT_CODES.provider;
  }
  if (error instanceof FileSystemError) {
    logger.error({ error: error.message }, 'File system error');
    return EXIT_CODES.fileSystem;
  }
  if (error instanceof FetchAbortedError) {
    logger.warn({ lastCompletedBlock: error.lastCompletedBlock }, 'Fetch aborted');
    return EXIT_CODES.aborted;
  }

  logger.error({
    error: error instanceof Error ? error.message : String(error),
  }, 'Unexpected error');
  return EXIT_CODES.usage;
}
