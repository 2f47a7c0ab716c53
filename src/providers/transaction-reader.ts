import { TransactionReceipt, TransactionResponse } from 'ethers';
import { ProviderError, ValidationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { validateTransactionHash } from '../utils/validation.js';
import { classifyProviderError, describeError } from './error-classifier.js';

export type TransactionStatus = 'success' | 'failed' | 'pending';

export type TransactionFields = Pick<
  TransactionResponse,
  'hash' | 'blockNumber' | 'from' | 'to' | 'value' | 'nonce' | 'gasLimit' | 'gasPrice'
>;

export type ReceiptFields = Pick<
  TransactionReceipt,
  'status' | 'blockNumber' | 'gasUsed' | 'gasPrice' | 'fee' | 'contractAddress' | 'logs'
>;

/**
 * The two provider calls a lookup needs. An ethers `Provider` satisfies it.
 */
export interface TransactionSource {
  getTransaction(hash: string): Promise<TransactionFields | null>;
  getTransactionReceipt(hash: string): Promise<ReceiptFields | null>;
}

export interface TransactionDetails {
  hash: string;
  status: TransactionStatus;
  /** null while pending */
  blockNumber: number | null;
  from: string;
  /** Recipient, or the created contract for deployments */
  to: string | null;
  value: bigint;
  nonce: number;
  gasLimit: bigint;
  gasPrice: bigint;
  gasUsed: bigint | null;
  fee: bigint | null;
  logCount: number;
}

export class TransactionReader {
  constructor(
    private readonly source: TransactionSource,
    private readonly logger?: Logger
  ) {}

  /**
   * Resolves to null when the node does not know the transaction.
   */
  async lookup(hash: string): Promise<TransactionDetails | null> {
    if (!validateTransactionHash(hash)) {
      throw new ValidationError(`Invalid transaction hash: ${hash}`);
    }

    let transaction: TransactionFields | null;
    let receipt: ReceiptFields | null;

    try {
      [transaction, receipt] = await Promise.all([
        this.source.getTransaction(hash),
        this.source.getTransactionReceipt(hash),
      ]);
    } catch (error) {
      throw new ProviderError(
        `Failed to look up transaction ${hash}: ${describeError(error)}`,
        { reason: classifyProviderError(error), cause: error }
      );
    }

    if (!transaction) {
      this.logger?.debug({ hash }, 'Transaction not found');
      return null;
    }

    return {
      hash: transaction.hash,
      status: receipt === null ? 'pending' : receipt.status === 0 ? 'failed' : 'success',
      blockNumber: receipt?.blockNumber ?? transaction.blockNumber,
      from: transaction.from,
      to: transaction.to ?? receipt?.contractAddress ?? null,
      value: transaction.value,
      nonce: transaction.nonce,
      gasLimit: transaction.gasLimit,
      gasPrice: receipt?.gasPrice ?? transaction.gasPrice,
      gasUsed: receipt?.gasUsed ?? null,
      fee: receipt?.fee ?? null,
      logCount: receipt?.logs.length ?? 0,
    };
  }
}
