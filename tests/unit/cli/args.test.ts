import { describe, it, expect } from 'vitest';
import {
  parseBlockWindow,
  parseEventKind,
  parseNonNegativeInt,
  parsePageSize,
  parseStrategy,
  resolveBalanceTargets,
  resolveBlockWindow,
} from '../../../src/cli/args.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { ALICE, BOB } from '../../fixtures/logs.js';

function headAt(head: number) {
  let calls = 0;
  return {
    get calls() {
      return calls;
    },
    async getBlockNumber() {
      calls++;
      return head;
    },
  };
}

describe('parseNonNegativeInt', () => {
  it('parses digits', () => {
    expect(parseNonNegativeInt(' 42 ', '--n')).toBe(42);
    expect(parseNonNegativeInt('0', '--n')).toBe(0);
  });

  it('rejects anything else', () => {
    expect(() => parseNonNegativeInt('-1', '--n')).toThrow('--n must be a non-negative integer, got "-1"');
    expect(() => parseNonNegativeInt('1.5', '--n')).toThrow(ValidationError);
    expect(() => parseNonNegativeInt('abc', '--n')).toThrow(ValidationError);
  });
});

describe('parseBlockWindow', () => {
  it('defaults to the recent window', () => {
    expect(parseBlockWindow({}, 100)).toEqual({ type: 'recent', numBlocks: 100 });
  });

  it('reads --recent', () => {
    expect(parseBlockWindow({ recent: '25' }, 100)).toEqual({ type: 'recent', numBlocks: 25 });
  });

  it('reads an explicit range', () => {
    expect(parseBlockWindow({ fromBlock: '10', toBlock: '20' }, 100)).toEqual({
      type: 'range',
      fromBlock: 10,
      toBlock: 20,
    });
  });

  it('treats a missing or latest --to-block as the head', () => {
    expect(parseBlockWindow({ fromBlock: '10' }, 100)).toEqual({ type: 'range', fromBlock: 10, toBlock: 'latest' });
    expect(parseBlockWindow({ fromBlock: '10', toBlock: 'latest' }, 100)).toEqual({
      type: 'range',
      fromBlock: 10,
      toBlock: 'latest',
    });
  });

  it('rejects an inverted range', () => {
    expect(() => parseBlockWindow({ fromBlock: '20', toBlock: '10' }, 100)).toThrow(
      '--from-block must be less than or equal to --to-block'
    );
  });

  it('rejects conflicting flags', () => {
    expect(() => parseBlockWindow({ recent: '5', fromBlock: '1' }, 100)).toThrow(ValidationError);
    expect(() => parseBlockWindow({ toBlock: '5' }, 100)).toThrow('--to-block requires --from-block');
    expect(() => parseBlockWindow({ recent: '0' }, 100)).toThrow('--recent must be at least 1');
  });
});

describe('resolveBlockWindow', () => {
  it('does not ask for the head for a closed range', async () => {
    const source = headAt(1000);

    await expect(resolveBlockWindow({ type: 'range', fromBlock: 1, toBlock: 2 }, source)).resolves.toEqual({
      fromBlock: 1,
      toBlock: 2,
    });
    expect(source.calls).toBe(0);
  });

  it('pins latest to the head', async () => {
    await expect(resolveBlockWindow({ type: 'range', fromBlock: 900, toBlock: 'latest' }, headAt(1000)))
      .resolves.toEqual({ fromBlock: 900, toBlock: 1000 });
  });

  it('rejects a start block past the head', async () => {
    await expect(resolveBlockWindow({ type: 'range', fromBlock: 1001, toBlock: 'latest' }, headAt(1000)))
      .rejects.toThrow('--from-block 1001 is past the chain head (1000)');
  });

  it('counts recent blocks back from the head', async () => {
    await expect(resolveBlockWindow({ type: 'recent', numBlocks: 10 }, headAt(1000))).resolves.toEqual({
      fromBlock: 991,
      toBlock: 1000,
    });
    await expect(resolveBlockWindow({ type: 'recent', numBlocks: 10 }, headAt(3))).resolves.toEqual({
      fromBlock: 0,
      toBlock: 3,
    });
  });
});

describe('option parsers', () => {
  it('parses event kinds case-insensitively', () => {
    expect(parseEventKind('transfer')).toBe('Transfer');
    expect(parseEventKind('APPROVAL')).toBe('Approval');
    expect(() => parseEventKind('Swap')).toThrow('--kind must be one of Transfer, Mint, Burn, Approval, got "Swap"');
  });

  it('parses strategies', () => {
    expect(parseStrategy('fixed')).toBe('fixed');
    expect(() => parseStrategy('bisect')).toThrow(ValidationError);
  });

  it('parses page sizes', () => {
    expect(parsePageSize('500')).toBe(500);
    expect(() => parsePageSize('0')).toThrow('--page-size must be at least 1');
  });
});

describe('resolveBalanceTargets', () => {
  it('prefers addresses from the command line', () => {
    expect(resolveBalanceTargets([BOB], [ALICE])).toEqual([BOB]);
  });

  it('falls back to the watchlist', () => {
    expect(resolveBalanceTargets([], [ALICE, BOB])).toEqual([ALICE, BOB]);
  });

  it('drops repeated addresses', () => {
    expect(resolveBalanceTargets([ALICE, ` ${ALICE}`, BOB], [])).toEqual([ALICE, BOB]);
  });

  it('needs at least one address', () => {
    expect(() => resolveBalanceTargets([], [])).toThrow('Give at least one address or configure a watchlist');
  });
});
