import { MaxUint256, ZeroAddress } from 'ethers';
import { DecodedEvent } from '../../src/core/types.js';
import { TOKEN_ADDRESS, txHash } from './logs.js';

function position(blockNumber: number, logIndex: number) {
  return {
    contractAddress: TOKEN_ADDRESS,
    blockNumber,
    logIndex,
    transactionHash: txHash(blockNumber * 1000 + logIndex),
  };
}

export function transfer(from: string, to: string, amount: bigint, blockNumber: number, logIndex = 0): DecodedEvent {
  return { kind: 'Transfer', fromAddress: from, toAddress: to, amount, ...position(blockNumber, logIndex) };
}

export function mint(to: string, amount: bigint, blockNumber: number, logIndex = 0): DecodedEvent {
  return { kind: 'Mint', fromAddress: ZeroAddress, toAddress: to, amount, ...position(blockNumber, logIndex) };
}

export function burn(from: string, amount: bigint, blockNumber: number, logIndex = 0): DecodedEvent {
  return { kind: 'Burn', fromAddress: from, toAddress: ZeroAddress, amount, ...position(blockNumber, logIndex) };
}

export function approval(owner: string, spender: string, amount: bigint, blockNumber: number, logIndex = 0): DecodedEvent {
  return {
    kind: 'Approval',
    fromAddress: owner,
    toAddress: spender,
    amount,
    unlimited: amount === MaxUint256,
    ...position(blockNumber, logIndex),
  };
}
