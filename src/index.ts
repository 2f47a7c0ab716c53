// Core types
export * from './core/types.js';

// Fetching
export { LogWindowFetcher } from './core/log-window-fetcher.js';
export type {
  LogWindowFetcherOptions,
  FetchOptions,
  FetchResult,
  PaginationStrategy,
} from './core/log-window-fetcher.js';
export { CachedLogWindowFetcher, cacheKey } from './core/cached-fetcher.js';
export type { CachedFetcherOptions } from './core/cached-fetcher.js';
export { BlockClock } from './core/block-clock.js';
export type { BlockClockOptions } from './core/block-clock.js';
export { partitionRange } from './core/partition.js';

// Event layouts and decoding
export { DEFAULT_EVENT_SIGNATURES, buildEventLayout, buildEventLayouts } from './abi/events.js';
export type { EventLayout, EventLayouts, EventSignatureOverrides } from './abi/events.js';
export { EventDecoder } from './abi/decoder.js';

// Providers
export type { LogSource } from './providers/log-source.js';
export { JsonRpcLogSource } from './providers/json-rpc-source.js';
export { classifyProviderError } from './providers/error-classifier.js';
export { TransactionReader } from './providers/transaction-reader.js';
export type {
  TransactionDetails,
  TransactionSource,
  TransactionStatus,
} from './providers/transaction-reader.js';

// Cache
export { TtlCache } from './cache/ttl-cache.js';
export type { TtlCacheOptions } from './cache/ttl-cache.js';

// Analysis
export { buildTransferGraph } from './analysis/graph.js';
export type { TransferGraph, TransferEdge, GraphOptions } from './analysis/graph.js';
export { summarizeBlocks, topAddresses, totalVolume } from './analysis/volume.js';
export type { BlockSummary, AddressTotal } from './analysis/volume.js';
export { buildActivityReport } from './analysis/report.js';
export type { ActivityReport, EventsByKind } from './analysis/report.js';

// Presentation
export { AddressBook, shortenAddress } from './export/address-book.js';
export { eventsToCsv, toCsv, CSV_COLUMNS } from './export/csv.js';
export { formatEventTable } from './export/table.js';
export { formatAmount } from './export/format.js';
export { formatTransaction } from './export/summary.js';

// Token reads
export { TokenReader } from './token/token-reader.js';
export type { AccountBalance, TokenInfo } from './token/token-reader.js';

// Configuration
export { parseConfig, loadConfigFile, PYUSD_ADDRESS } from './cli/config.js';
export type { Config } from './cli/config.js';

// Logger
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';

// Errors
export {
  StableScopeError,
  ConfigError,
  ValidationError,
  ProviderError,
  DecodeError,
  FetchAbortedError,
  FileSystemError,
} from './utils/errors.js';
export type { ProviderErrorReason } from './utils/errors.js';
