import { ethers } from 'ethers';
import { LogEntry } from '../core/types.js';
import { ProviderError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { LogSource } from './log-source.js';
import { classifyProviderError, describeError } from './error-classifier.js';

export class JsonRpcLogSource implements LogSource {
  constructor(
    private readonly provider: ethers.JsonRpcProvider,
    private readonly logger?: Logger
  ) {}

  static fromUrl(url: string, logger?: Logger): JsonRpcLogSource {
    return new JsonRpcLogSource(new ethers.JsonRpcProvider(url), logger);
  }

  get rpc(): ethers.JsonRpcProvider {
    return this.provider;
  }

  async queryLogs(
    address: string,
    topics: string[],
    fromBlock: number,
    toBlock: number
  ): Promise<LogEntry[]> {
    const startTime = Date.now();

    try {
      const logs = await this.provider.getLogs({
        address,
        topics: [topics],
        fromBlock,
        toBlock,
      });

      this.logger?.debug({
        fromBlock,
        toBlock,
        logCount: logs.length,
        durationMs: Date.now() - startTime,
      }, 'eth_getLogs');

      return logs.map(log => ({
        address: log.address,
        blockNumber: log.blockNumber,
        transactionHash: log.transactionHash,
        logIndex: log.index,
        topics: [...log.topics],
        data: log.data,
      }));
    } catch (error) {
      throw new ProviderError(
        `eth_getLogs failed for blocks ${fromBlock}-${toBlock}: ${describeError(error)}`,
        { reason: classifyProviderError(error), fromBlock, toBlock, cause: error }
      );
    }
  }

  async getBlockNumber(): Promise<number> {
    try {
      return await this.provider.getBlockNumber();
    } catch (error) {
      throw new ProviderError(
        `Failed to get latest block number: ${describeError(error)}`,
        { reason: classifyProviderError(error), cause: error }
      );
    }
  }

  async getBlockTimestamp(blockNumber: number): Promise<number> {
    let block: ethers.Block | null;

    try {
      block = await this.provider.getBlock(blockNumber);
    } catch (error) {
      throw new ProviderError(
        `Failed to get block ${blockNumber}: ${describeError(error)}`,
        { reason: classifyProviderError(error), fromBlock: blockNumber, toBlock: blockNumber, cause: error }
      );
    }

    if (!block) {
      throw new ProviderError(`Block ${blockNumber} not found`, {
        reason: 'unknown',
        fromBlock: blockNumber,
        toBlock: blockNumber,
      });
    }

    return block.timestamp;
  }

  destroy(): void {
    this.provider.destroy();
  }
}
