import { DecodedEvent } from '../core/types.js';
import { compareText } from './compare.js';

export interface TransferEdge {
  from: string;
  to: string;
  totalAmount: bigint;
  count: number;
}

export interface TransferGraph {
  nodes: string[];
  edges: TransferEdge[];
}

export interface GraphOptions {
  /** Events below this amount (base units) are left out */
  minAmount?: bigint;
  maxEdges?: number;
}

/**
 * Aggregates (fromAddress, toAddress) pairs into weighted edges, heaviest
 * first. Ties sort by sender, then recipient.
 */
export function buildTransferGraph(events: readonly DecodedEvent[], options: GraphOptions = {}): TransferGraph {
  const minAmount = options.minAmount ?? 0n;
  const edgesByPair = new Map<string, TransferEdge>();

  for (const event of events) {
    if (event.amount < minAmount) {
      continue;
    }

    const key = `${event.fromAddress}->${event.toAddress}`;
    const edge = edgesByPair.get(key);

    if (edge) {
      edge.totalAmount += event.amount;
      edge.count++;
    } else {
      edgesByPair.set(key, {
        from: event.fromAddress,
        to: event.toAddress,
        totalAmount: event.amount,
        count: 1,
      });
    }
  }

  const sorted = [...edgesByPair.values()].sort((a, b) => {
    if (a.totalAmount !== b.totalAmount) {
      return a.totalAmount > b.totalAmount ? -1 : 1;
    }
    return compareText(a.from, b.from) || compareText(a.to, b.to);
  });

  const edges = options.maxEdges === undefined ? sorted : sorted.slice(0, options.maxEdges);

  const nodes: string[] = [];
  const seen = new Set<string>();
  for (const edge of edges) {
    for (const address of [edge.from, edge.to]) {
      if (!seen.has(address)) {
        seen.add(address);
        nodes.push(address);
      }
    }
  }

  return { nodes, edges };
}
