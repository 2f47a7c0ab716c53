import { TtlCache } from '../cache/ttl-cache.js';
import { Logger } from '../utils/logger.js';
import { FetchOptions, FetchResult, LogWindowFetcher } from './log-window-fetcher.js';
import { EventKind } from './types.js';

export interface CachedFetcherOptions {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Memoises successful fetches by request parameters. Failures are never
 * cached, and recent-window fetches always go to the provider since the
 * head keeps moving.
 */
export class CachedLogWindowFetcher {
  private readonly cache: TtlCache<string, FetchResult>;

  constructor(
    private readonly fetcher: LogWindowFetcher,
    private readonly logger: Logger,
    options: CachedFetcherOptions
  ) {
    this.cache = new TtlCache({
      ttlMs: options.ttlMs,
      maxEntries: options.maxEntries,
      now: options.now,
    });
  }

  async fetch(
    contractAddress: string,
    kind: EventKind,
    fromBlock: number,
    toBlock: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    const key = cacheKey(contractAddress, kind, fromBlock, toBlock, options.pageSize);
    const cached = this.cache.get(key);

    if (cached) {
      this.logger.debug({ key }, 'Cache hit');
      return copyResult(cached);
    }

    const result = await this.fetcher.fetch(contractAddress, kind, fromBlock, toBlock, options);
    this.cache.set(key, copyResult(result));
    return result;
  }

  fetchRecent(
    contractAddress: string,
    kind: EventKind,
    numBlocks: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    return this.fetcher.fetchRecent(contractAddress, kind, numBlocks, options);
  }

  /**
   * Drops cached results for one contract, or everything when called
   * without an address.
   */
  invalidate(contractAddress?: string): number {
    if (contractAddress === undefined) {
      const size = this.cache.size;
      this.cache.clear();
      return size;
    }

    const prefix = `${contractAddress.toLowerCase()}:`;
    return this.cache.deleteWhere(key => key.startsWith(prefix));
  }

  get size(): number {
    return this.cache.size;
  }
}

// Events are frozen; only the arrays around them need copying
function copyResult(result: FetchResult): FetchResult {
  return { events: [...result.events], failures: [...result.failures], pages: result.pages };
}

export function cacheKey(
  contractAddress: string,
  kind: EventKind,
  fromBlock: number,
  toBlock: number,
  pageSize?: number
): string {
  return [contractAddress.toLowerCase(), kind, fromBlock, toBlock, pageSize ?? 'default'].join(':');
}
