import { EVENT_KINDS, EventKind } from '../core/types.js';
import { PaginationStrategy } from '../core/log-window-fetcher.js';
import { LogSource } from '../providers/log-source.js';
import { ValidationError } from '../utils/errors.js';

export type BlockWindow =
  | { type: 'range'; fromBlock: number; toBlock: number | 'latest' }
  | { type: 'recent'; numBlocks: number };

export interface WindowOptions {
  fromBlock?: string;
  toBlock?: string;
  recent?: string;
}

export function parseNonNegativeInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

/**
 * Reads --from-block/--to-block or --recent. Without either, the last
 * `defaultRecent` blocks are used.
 */
export function parseBlockWindow(options: WindowOptions, defaultRecent: number): BlockWindow {
  if (options.recent !== undefined) {
    if (options.fromBlock !== undefined || options.toBlock !== undefined) {
      throw new ValidationError('--recent cannot be combined with --from-block or --to-block');
    }
    const numBlocks = parseNonNegativeInt(options.recent, '--recent');
    if (numBlocks === 0) {
      throw new ValidationError('--recent must be at least 1');
    }
    return { type: 'recent', numBlocks };
  }

  if (options.fromBlock === undefined) {
    if (options.toBlock !== undefined) {
      throw new ValidationError('--to-block requires --from-block');
    }
    return { type: 'recent', numBlocks: defaultRecent };
  }

  const fromBlock = parseNonNegativeInt(options.fromBlock, '--from-block');
  const toBlock =
    options.toBlock === undefined || options.toBlock === 'latest'
      ? 'latest'
      : parseNonNegativeInt(options.toBlock, '--to-block');

  if (toBlock !== 'latest' && fromBlock > toBlock) {
    throw new ValidationError('--from-block must be less than or equal to --to-block');
  }

  return { type: 'range', fromBlock, toBlock };
}

/**
 * Pins a window to concrete block numbers, asking the source for the head
 * only when needed.
 */
export async function resolveBlockWindow(
  window: BlockWindow,
  source: Pick<LogSource, 'getBlockNumber'>
): Promise<{ fromBlock: number; toBlock: number }> {
  if (window.type === 'range' && window.toBlock !== 'latest') {
    return { fromBlock: window.fromBlock, toBlock: window.toBlock };
  }

  const head = await source.getBlockNumber();

  if (window.type === 'recent') {
    return { fromBlock: Math.max(0, head - window.numBlocks + 1), toBlock: head };
  }

  if (window.fromBlock > head) {
    throw new ValidationError(`--from-block ${window.fromBlock} is past the chain head (${head})`);
  }

  return { fromBlock: window.fromBlock, toBlock: head };
}

export function parseEventKind(value: string): EventKind {
  const kind = EVENT_KINDS.find(candidate => candidate.toLowerCase() === value.trim().toLowerCase());
  if (!kind) {
    throw new ValidationError(`--kind must be one of ${EVENT_KINDS.join(', ')}, got "${value}"`);
  }
  return kind;
}

export function parseStrategy(value: string): PaginationStrategy {
  if (value !== 'adaptive' && value !== 'fixed') {
    throw new ValidationError(`--strategy must be adaptive or fixed, got "${value}"`);
  }
  return value;
}

export function parsePageSize(value: string): number {
  const pageSize = parseNonNegativeInt(value, '--page-size');
  if (pageSize === 0) {
    throw new ValidationError('--page-size must be at least 1');
  }
  return pageSize;
}

/**
 * Addresses given on the command line, or the configured watchlist.
 */
export function resolveBalanceTargets(addresses: string[], watchlist: string[]): string[] {
  const targets = addresses.length > 0 ? addresses : watchlist;
  if (targets.length === 0) {
    throw new ValidationError('Give at least one address or configure a watchlist');
  }
  return [...new Set(targets.map(address => address.trim()))];
}
