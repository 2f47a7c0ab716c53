import { EventDecoder } from '../abi/decoder.js';
import { buildEventLayouts } from '../abi/events.js';
import { BlockClock } from '../core/block-clock.js';
import { CachedLogWindowFetcher } from '../core/cached-fetcher.js';
import { LogWindowFetcher, PaginationStrategy } from '../core/log-window-fetcher.js';
import { AddressBook } from '../export/address-book.js';
import { JsonRpcLogSource } from '../providers/json-rpc-source.js';
import { TransactionReader } from '../providers/transaction-reader.js';
import { TokenReader } from '../token/token-reader.js';
import { Logger } from '../utils/logger.js';
import { Config } from './config.js';

export interface CommandContext {
  config: Config;
  logger: Logger;
  source: JsonRpcLogSource;
  decoder: EventDecoder;
  fetcher: CachedLogWindowFetcher;
  clock: BlockClock;
  token: TokenReader;
  transactions: TransactionReader;
  addressBook: AddressBook;
  close(): void;
}

export interface ContextOverrides {
  pageSize?: number;
  strategy?: PaginationStrategy;
}

export function createContext(config: Config, logger: Logger, overrides: ContextOverrides = {}): CommandContext {
  const decoder = new EventDecoder(buildEventLayouts({
    Transfer: config.events.transfer,
    Approval: config.events.approval,
    Mint: config.events.mint,
    Burn: config.events.burn,
  }));
  const addressBook = new AddressBook(config.labels);

  logger.debug({ rpcUrl: redactUrl(config.rpc.url) }, 'Connecting to RPC endpoint');
  const source = JsonRpcLogSource.fromUrl(config.rpc.url, logger);

  const fetcher = new CachedLogWindowFetcher(
    new LogWindowFetcher(source, decoder, logger, {
      pageSize: overrides.pageSize ?? config.fetch.page_size,
      minPageSize: Math.min(config.fetch.min_page_size, overrides.pageSize ?? config.fetch.page_size),
      strategy: overrides.strategy ?? config.fetch.strategy,
    }),
    logger,
    { ttlMs: config.cache.ttl_ms, maxEntries: config.cache.max_entries }
  );

  return {
    config,
    logger,
    source,
    decoder,
    fetcher,
    clock: new BlockClock(source, logger),
    token: new TokenReader(config.token.address, source.rpc),
    transactions: new TransactionReader(source.rpc, logger),
    addressBook,
    close: () => source.destroy(),
  };
}

/**
 * Keeps scheme and host only; RPC URLs often embed API keys in the path.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/...`;
  } catch {
    return '<invalid url>';
  }
}
