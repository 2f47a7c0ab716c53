import { LogSource } from '../providers/log-source.js';
import { Logger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';

export interface BlockClockOptions {
  retries?: number;
  minTimeout?: number;
  maxTimeout?: number;
}

/**
 * Resolves block timestamps (unix seconds) for display, fetching each block
 * once per clock instance.
 */
export class BlockClock {
  private readonly timestamps = new Map<number, number>();

  constructor(
    private readonly source: LogSource,
    private readonly logger: Logger,
    private readonly options: BlockClockOptions = {}
  ) {}

  async resolve(blockNumbers: Iterable<number>): Promise<Map<number, number>> {
    const unique = [...new Set(blockNumbers)];
    const missing = unique.filter(blockNumber => !this.timestamps.has(blockNumber));

    if (missing.length > 0) {
      this.logger.debug({ blockCount: missing.length }, 'Fetching block timestamps');
    }

    for (const blockNumber of missing) {
      const timestamp = await retry(
        () => this.source.getBlockTimestamp(blockNumber),
        {
          retries: this.options.retries ?? 3,
          minTimeout: this.options.minTimeout ?? 500,
          maxTimeout: this.options.maxTimeout ?? 10000,
          logger: this.logger,
          operationName: `getBlock(${blockNumber})`,
        }
      );
      this.timestamps.set(blockNumber, timestamp);
    }

    const resolved = new Map<number, number>();
    for (const blockNumber of unique) {
      const timestamp = this.timestamps.get(blockNumber);
      if (timestamp !== undefined) {
        resolved.set(blockNumber, timestamp);
      }
    }
    return resolved;
  }
}
