import { EventDecoder } from '../abi/decoder.js';
import { LogSource } from '../providers/log-source.js';
import { classifyProviderError, describeError } from '../providers/error-classifier.js';
import { DecodeError, FetchAbortedError, ProviderError, ValidationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { validateBlockNumber, validateEthereumAddress, validatePageSize } from '../utils/validation.js';
import { partitionRange } from './partition.js';
import { BlockRange, DecodedEvent, EventKind, LogEntry, compareByPosition } from './types.js';

/**
 * `fixed` surfaces every rejection, `adaptive` halves the page size when the
 * provider reports the range as too large.
 */
export type PaginationStrategy = 'adaptive' | 'fixed';

export interface LogWindowFetcherOptions {
  pageSize?: number;
  minPageSize?: number;
  strategy?: PaginationStrategy;
}

export interface FetchOptions {
  pageSize?: number;
  signal?: AbortSignal;
}

export interface FetchResult {
  events: DecodedEvent[];
  failures: DecodeError[];
  /** Successful log queries */
  pages: number;
}

export class LogWindowFetcher {
  private readonly pageSize: number;
  private readonly minPageSize: number;
  private readonly strategy: PaginationStrategy;

  constructor(
    private readonly source: LogSource,
    private readonly decoder: EventDecoder,
    private readonly logger: Logger,
    options: LogWindowFetcherOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 1000;
    this.minPageSize = options.minPageSize ?? 1;
    this.strategy = options.strategy ?? 'adaptive';

    if (!validatePageSize(this.pageSize) || !validatePageSize(this.minPageSize)) {
      throw new ValidationError('pageSize and minPageSize must be positive integers');
    }
    if (this.minPageSize > this.pageSize) {
      throw new ValidationError(
        `minPageSize (${this.minPageSize}) must not exceed pageSize (${this.pageSize})`
      );
    }
  }

  async fetch(
    contractAddress: string,
    kind: EventKind,
    fromBlock: number,
    toBlock: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    const initialPageSize = options.pageSize ?? this.pageSize;
    this.validateRequest(contractAddress, fromBlock, toBlock, initialPageSize);

    const topic = this.decoder.topicFor(kind);
    const logs: LogEntry[] = [];
    let pageSize = initialPageSize;
    let pending = partitionRange(fromBlock, toBlock, pageSize);
    let lastCompletedBlock: number | null = null;
    let pages = 0;

    while (pending.length > 0) {
      const [range, ...rest] = pending;

      if (options.signal?.aborted) {
        throw new FetchAbortedError(
          `Fetch of ${kind} events aborted before blocks ${range.fromBlock}-${range.toBlock}`,
          lastCompletedBlock
        );
      }

      this.logger.debug({
        contractAddress,
        kind,
        fromBlock: range.fromBlock,
        toBlock: range.toBlock,
        pageSize,
      }, 'Fetching logs');

      try {
        const page = await this.source.queryLogs(contractAddress, [topic], range.fromBlock, range.toBlock);
        logs.push(...page);
        pages++;
        lastCompletedBlock = range.toBlock;
        pending = rest;
      } catch (error) {
        const providerError = this.toProviderError(error, range);
        const span = range.toBlock - range.fromBlock + 1;

        if (
          this.strategy === 'adaptive' &&
          providerError.reason === 'range-too-large' &&
          span > this.minPageSize
        ) {
          const oldPageSize = pageSize;
          pageSize = Math.max(Math.floor(span / 2), this.minPageSize);

          this.logger.warn({
            contractAddress,
            oldPageSize,
            newPageSize: pageSize,
            fromBlock: range.fromBlock,
            toBlock: range.toBlock,
            error: providerError.message,
          }, 'Block range too large, reducing page size');

          // Re-plan everything left from the failed range onward
          pending = partitionRange(range.fromBlock, toBlock, pageSize);
          continue;
        }

        throw providerError;
      }
    }

    const result = this.decodeAll(kind, logs);

    this.logger.info({
      contractAddress,
      kind,
      fromBlock,
      toBlock,
      eventCount: result.events.length,
      failureCount: result.failures.length,
      pages,
      finalPageSize: pageSize,
    }, 'Fetched events');

    return { ...result, pages };
  }

  /**
   * Fetches the last `numBlocks` blocks up to the current chain head.
   */
  async fetchRecent(
    contractAddress: string,
    kind: EventKind,
    numBlocks: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    if (!validatePageSize(numBlocks)) {
      throw new ValidationError(`numBlocks must be a positive integer, got ${numBlocks}`);
    }

    const head = await this.source.getBlockNumber();
    const fromBlock = Math.max(0, head - numBlocks + 1);

    return this.fetch(contractAddress, kind, fromBlock, head, options);
  }

  private validateRequest(
    contractAddress: string,
    fromBlock: number,
    toBlock: number,
    pageSize: number
  ): void {
    if (!validateEthereumAddress(contractAddress)) {
      throw new ValidationError(`Invalid contract address: ${contractAddress}`);
    }
    if (!validateBlockNumber(fromBlock) || !validateBlockNumber(toBlock)) {
      throw new ValidationError(
        `Block numbers must be non-negative integers, got ${fromBlock}-${toBlock}`
      );
    }
    if (fromBlock > toBlock) {
      throw new ValidationError(`fromBlock (${fromBlock}) must not exceed toBlock (${toBlock})`);
    }
    if (!validatePageSize(pageSize)) {
      throw new ValidationError(`pageSize must be a positive integer, got ${pageSize}`);
    }
  }

  private decodeAll(kind: EventKind, logs: LogEntry[]): Omit<FetchResult, 'pages'> {
    const ordered = [...logs].sort(compareByPosition);
    const events: DecodedEvent[] = [];
    const failures: DecodeError[] = [];

    for (const log of ordered) {
      try {
        events.push(this.decoder.decode(kind, log));
      } catch (error) {
        if (!(error instanceof DecodeError)) {
          throw error;
        }

        this.logger.warn({
          kind,
          blockNumber: log.blockNumber,
          transactionHash: log.transactionHash,
          logIndex: log.logIndex,
          error: error.message,
        }, 'Skipping undecodable log');

        failures.push(error);
      }
    }

    return { events, failures };
  }

  private toProviderError(error: unknown, range: BlockRange): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    return new ProviderError(
      `Log query failed for blocks ${range.fromBlock}-${range.toBlock}: ${describeError(error)}`,
      {
        reason: classifyProviderError(error),
        fromBlock: range.fromBlock,
        toBlock: range.toBlock,
        cause: error,
      }
    );
  }
}
