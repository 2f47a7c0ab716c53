import { LogEntry } from '../core/types.js';

/**
 * Read-only blockchain access the fetcher depends on. Implementations reject
 * with ProviderError.
 */
export interface LogSource {
  queryLogs(address: string, topics: string[], fromBlock: number, toBlock: number): Promise<LogEntry[]>;
  getBlockNumber(): Promise<number>;
  getBlockTimestamp(blockNumber: number): Promise<number>;
}
