import { describe, it, expect } from 'vitest';
import { partitionRange } from '../../../src/core/partition.js';

describe('partitionRange', () => {
  it('splits a range into ascending pages', () => {
    expect(partitionRange(100, 105, 2)).toEqual([
      { fromBlock: 100, toBlock: 101 },
      { fromBlock: 102, toBlock: 103 },
      { fromBlock: 104, toBlock: 105 },
    ]);
  });

  it('shortens the final page', () => {
    expect(partitionRange(0, 9, 4)).toEqual([
      { fromBlock: 0, toBlock: 3 },
      { fromBlock: 4, toBlock: 7 },
      { fromBlock: 8, toBlock: 9 },
    ]);
  });

  it('returns a single page when the range fits', () => {
    expect(partitionRange(50, 60, 1000)).toEqual([{ fromBlock: 50, toBlock: 60 }]);
  });

  it('handles single-block ranges', () => {
    expect(partitionRange(7, 7, 1)).toEqual([{ fromBlock: 7, toBlock: 7 }]);
  });

  it('returns no pages for an empty range', () => {
    expect(partitionRange(10, 9, 5)).toEqual([]);
  });

  it('covers every block exactly once', () => {
    const pages = partitionRange(1, 1000, 37);
    const blocks = pages.reduce((total, page) => total + page.toBlock - page.fromBlock + 1, 0);

    expect(blocks).toBe(1000);
    expect(pages[0]?.fromBlock).toBe(1);
    expect(pages[pages.length - 1]?.toBlock).toBe(1000);
  });

  it('rejects non-positive page sizes', () => {
    expect(() => partitionRange(0, 10, 0)).toThrow(RangeError);
    expect(() => partitionRange(0, 10, 1.5)).toThrow(RangeError);
  });
});
