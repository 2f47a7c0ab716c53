import { DecodedEvent } from '../core/types.js';
import { compareText } from './compare.js';

export interface BlockSummary {
  blockNumber: number;
  count: number;
  volume: bigint;
}

export interface AddressTotal {
  address: string;
  volume: bigint;
  count: number;
}

export type AddressSide = 'from' | 'to';

export function totalVolume(events: readonly DecodedEvent[]): bigint {
  return events.reduce((sum, event) => sum + event.amount, 0n);
}

/**
 * Event count and volume per block, ascending by block number.
 */
export function summarizeBlocks(events: readonly DecodedEvent[]): BlockSummary[] {
  const byBlock = new Map<number, BlockSummary>();

  for (const event of events) {
    const summary = byBlock.get(event.blockNumber);
    if (summary) {
      summary.count++;
      summary.volume += event.amount;
    } else {
      byBlock.set(event.blockNumber, { blockNumber: event.blockNumber, count: 1, volume: event.amount });
    }
  }

  return [...byBlock.values()].sort((a, b) => a.blockNumber - b.blockNumber);
}

/**
 * Largest senders or recipients by volume.
 */
export function topAddresses(
  events: readonly DecodedEvent[],
  side: AddressSide,
  limit = 10
): AddressTotal[] {
  const totals = new Map<string, AddressTotal>();

  for (const event of events) {
    const address = side === 'from' ? event.fromAddress : event.toAddress;
    const total = totals.get(address);
    if (total) {
      total.volume += event.amount;
      total.count++;
    } else {
      totals.set(address, { address, volume: event.amount, count: 1 });
    }
  }

  return [...totals.values()]
    .sort((a, b) => {
      if (a.volume !== b.volume) {
        return a.volume > b.volume ? -1 : 1;
      }
      return compareText(a.address, b.address);
    })
    .slice(0, limit);
}
