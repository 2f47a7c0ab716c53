import { BlockRange } from './types.js';

/**
 * Splits the inclusive range [fromBlock, toBlock] into consecutive ranges of
 * at most `pageSize` blocks, ascending.
 */
export function partitionRange(fromBlock: number, toBlock: number, pageSize: number): BlockRange[] {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const ranges: BlockRange[] = [];

  for (let start = fromBlock; start <= toBlock; start += pageSize) {
    ranges.push({ fromBlock: start, toBlock: Math.min(start + pageSize - 1, toBlock) });
  }

  return ranges;
}
