import { BlockRange, DecodedEvent, EventKind } from '../core/types.js';
import { AddressTotal, BlockSummary, summarizeBlocks, topAddresses, totalVolume } from './volume.js';

export type EventsByKind = Record<EventKind, readonly DecodedEvent[]>;

export interface ActivityReport extends BlockRange {
  counts: Record<EventKind, number>;
  transferVolume: bigint;
  minted: bigint;
  burned: bigint;
  /** minted - burned, negative when supply shrank */
  netSupplyChange: bigint;
  unlimitedApprovals: number;
  topSenders: AddressTotal[];
  topRecipients: AddressTotal[];
  busiestBlocks: BlockSummary[];
}

export function buildActivityReport(events: EventsByKind, range: BlockRange, limit = 5): ActivityReport {
  const minted = totalVolume(events.Mint);
  const burned = totalVolume(events.Burn);

  const busiestBlocks = summarizeBlocks(events.Transfer)
    .sort((a, b) => b.count - a.count || a.blockNumber - b.blockNumber)
    .slice(0, limit);

  return {
    ...range,
    counts: {
      Transfer: events.Transfer.length,
      Mint: events.Mint.length,
      Burn: events.Burn.length,
      Approval: events.Approval.length,
    },
    transferVolume: totalVolume(events.Transfer),
    minted,
    burned,
    netSupplyChange: minted - burned,
    unlimitedApprovals: events.Approval.filter(event => event.kind === 'Approval' && event.unlimited).length,
    topSenders: topAddresses(events.Transfer, 'from', limit),
    topRecipients: topAddresses(events.Transfer, 'to', limit),
    busiestBlocks,
  };
}
