import { Interface } from 'ethers';
import { LogEntry } from '../../src/core/types.js';

export const TOKEN_ADDRESS = '0x6c3ea9036406852006290770bedfcaba0e23a0e8';

// All-digit addresses are their own checksum form
export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const CAROL = '0x3333333333333333333333333333333333333333';

export const TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';
export const APPROVAL_TOPIC = '0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925';

export const fixtureInterface = new Interface([
  'event Transfer(address indexed from, address indexed to, uint256 value)',
  'event Approval(address indexed owner, address indexed spender, uint256 value)',
  'event SupplyIncreased(address indexed to, uint256 value)',
  'event SupplyDecreased(address indexed from, uint256 value)',
  'event Mint(address indexed to, uint256 amount)',
]);

export function txHash(seed: number): string {
  return `0x${seed.toString(16).padStart(64, '0')}`;
}

export function makeLog(
  eventName: string,
  args: unknown[],
  blockNumber: number,
  logIndex: number
): LogEntry {
  const fragment = fixtureInterface.getEvent(eventName);
  if (!fragment) {
    throw new Error(`Unknown fixture event ${eventName}`);
  }

  const { topics, data } = fixtureInterface.encodeEventLog(fragment, args);

  return {
    address: TOKEN_ADDRESS,
    blockNumber,
    logIndex,
    transactionHash: txHash(blockNumber * 1000 + logIndex),
    topics,
    data,
  };
}

export function transferLog(from: string, to: string, value: bigint, blockNumber: number, logIndex: number): LogEntry {
  return makeLog('Transfer', [from, to, value], blockNumber, logIndex);
}

export function approvalLog(owner: string, spender: string, value: bigint, blockNumber: number, logIndex: number): LogEntry {
  return makeLog('Approval', [owner, spender, value], blockNumber, logIndex);
}

export function mintLog(to: string, value: bigint, blockNumber: number, logIndex: number): LogEntry {
  return makeLog('SupplyIncreased', [to, value], blockNumber, logIndex);
}

export function burnLog(from: string, value: bigint, blockNumber: number, logIndex: number): LogEntry {
  return makeLog('SupplyDecreased', [from, value], blockNumber, logIndex);
}
