export const EVENT_KINDS = ['Transfer', 'Mint', 'Burn', 'Approval'] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export interface EventFilter {
  contractAddress: string;
  eventSignatureTopic: string;
  fromBlock: number;
  toBlock: number;
}

/**
 * Raw log as returned by the provider.
 */
export interface LogEntry {
  readonly address: string;
  readonly blockNumber: number;
  readonly transactionHash: string;
  readonly logIndex: number;
  readonly topics: readonly string[];
  readonly data: string;
}

interface DecodedEventBase {
  readonly contractAddress: string;
  readonly fromAddress: string;
  readonly toAddress: string;
  /** Token base units, no decimal scaling */
  readonly amount: bigint;
  readonly blockNumber: number;
  readonly transactionHash: string;
  readonly logIndex: number;
}

export interface TransferEvent extends DecodedEventBase {
  readonly kind: 'Transfer';
}

export interface MintEvent extends DecodedEventBase {
  readonly kind: 'Mint';
}

export interface BurnEvent extends DecodedEventBase {
  readonly kind: 'Burn';
}

export interface ApprovalEvent extends DecodedEventBase {
  readonly kind: 'Approval';
  /** Allowance set to the maximum uint256 */
  readonly unlimited: boolean;
}

export type DecodedEvent = TransferEvent | MintEvent | BurnEvent | ApprovalEvent;

export interface BlockRange {
  fromBlock: number;
  toBlock: number;
}

export function compareByPosition(
  a: { blockNumber: number; logIndex: number },
  b: { blockNumber: number; logIndex: number }
): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}
