import { describe, it, expect } from 'vitest';
import { MaxUint256, ZeroAddress } from 'ethers';
import { EventDecoder } from '../../../src/abi/decoder.js';
import { buildEventLayouts } from '../../../src/abi/events.js';
import { DecodeError } from '../../../src/utils/errors.js';
import {
  ALICE,
  BOB,
  TOKEN_ADDRESS,
  TRANSFER_TOPIC,
  approvalLog,
  burnLog,
  makeLog,
  mintLog,
  transferLog,
  txHash,
} from '../../fixtures/logs.js';

function decodeError(run: () => unknown): DecodeError {
  try {
    run();
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a DecodeError');
}

describe('EventDecoder', () => {
  const decoder = new EventDecoder();

  describe('Transfer', () => {
    it('decodes indexed addresses and the raw amount', () => {
      const event = decoder.decode('Transfer', transferLog(ALICE, BOB, 1500000n, 100, 3));

      expect(event).toEqual({
        kind: 'Transfer',
        contractAddress: TOKEN_ADDRESS,
        fromAddress: ALICE,
        toAddress: BOB,
        amount: 1500000n,
        blockNumber: 100,
        transactionHash: txHash(100003),
        logIndex: 3,
      });
    });

    it('returns frozen records', () => {
      const event = decoder.decode('Transfer', transferLog(ALICE, BOB, 1n, 100, 0));
      expect(Object.isFrozen(event)).toBe(true);
    });

    it('keeps amounts above 2^53 exact', () => {
      const amount = 123456789012345678901234567890n;
      const event = decoder.decode('Transfer', transferLog(ALICE, BOB, amount, 1, 0));
      expect(event.amount).toBe(amount);
    });
  });

  describe('Approval', () => {
    it('maps owner and spender to from and to', () => {
      const event = decoder.decode('Approval', approvalLog(ALICE, BOB, 5000n, 101, 0));

      expect(event.kind).toBe('Approval');
      expect(event.fromAddress).toBe(ALICE);
      expect(event.toAddress).toBe(BOB);
      expect(event.amount).toBe(5000n);
      expect(event.kind === 'Approval' && event.unlimited).toBe(false);
    });

    it('flags max uint256 allowances as unlimited', () => {
      const event = decoder.decode('Approval', approvalLog(ALICE, BOB, MaxUint256, 101, 1));
      expect(event.kind === 'Approval' && event.unlimited).toBe(true);
    });
  });

  describe('Mint and Burn', () => {
    it('decodes a mint as a transfer from the zero address', () => {
      const event = decoder.decode('Mint', mintLog(ALICE, 1000000n, 102, 0));

      expect(event.kind).toBe('Mint');
      expect(event.fromAddress).toBe(ZeroAddress);
      expect(event.toAddress).toBe(ALICE);
      expect(event.amount).toBe(1000000n);
    });

    it('decodes a burn as a transfer to the zero address', () => {
      const event = decoder.decode('Burn', burnLog(BOB, 250n, 103, 2));

      expect(event.kind).toBe('Burn');
      expect(event.fromAddress).toBe(BOB);
      expect(event.toAddress).toBe(ZeroAddress);
      expect(event.amount).toBe(250n);
    });

    it('decodes an overridden Mint signature', () => {
      const custom = new EventDecoder(buildEventLayouts({ Mint: 'Mint(address indexed to, uint256 amount)' }));
      const event = custom.decode('Mint', makeLog('Mint', [BOB, 42n], 104, 0));

      expect(event.toAddress).toBe(BOB);
      expect(event.amount).toBe(42n);
    });

    it('rejects the default supply event when Mint was overridden', () => {
      const custom = new EventDecoder(buildEventLayouts({ Mint: 'Mint(address indexed to, uint256 amount)' }));
      expect(() => custom.decode('Mint', mintLog(BOB, 42n, 104, 0))).toThrow(DecodeError);
    });
  });

  describe('layout mismatches', () => {
    it('rejects a log whose signature topic belongs to another event', () => {
      const error = decodeError(() => decoder.decode('Approval', transferLog(ALICE, BOB, 1n, 100, 4)));

      expect(error.message).toContain('does not match Approval(address,address,uint256)');
      expect(error.kind).toBe('Approval');
      expect(error.blockNumber).toBe(100);
      expect(error.transactionHash).toBe(txHash(100004));
      expect(error.logIndex).toBe(4);
    });

    it('rejects a log without topics', () => {
      const log = { ...transferLog(ALICE, BOB, 1n, 100, 0), topics: [] };
      expect(() => decoder.decode('Transfer', log)).toThrow('log has no topics');
    });

    it('rejects a missing indexed topic', () => {
      const valid = transferLog(ALICE, BOB, 1n, 100, 0);
      const log = { ...valid, topics: valid.topics.slice(0, 2) };

      expect(() => decoder.decode('Transfer', log)).toThrow('expected 2 indexed topics, got 1');
    });

    it('rejects data of the wrong length', () => {
      const valid = transferLog(ALICE, BOB, 1n, 100, 0);
      const log = { ...valid, data: `${valid.data}00` };

      expect(() => decoder.decode('Transfer', log)).toThrow('expected 32 bytes of data, got 33');
    });

    it('rejects non-hex data', () => {
      const log = { ...transferLog(ALICE, BOB, 1n, 100, 0), data: 'not-hex' };
      expect(() => decoder.decode('Transfer', log)).toThrow('data is not a hex byte string');
    });

    it('rejects an indexed topic that is not a padded address', () => {
      const dirtyTopic = `0x${'ff'.repeat(12)}${'11'.repeat(20)}`;
      const log = { ...transferLog(ALICE, BOB, 1n, 100, 0), topics: [TRANSFER_TOPIC, dirtyTopic, dirtyTopic] };

      expect(() => decoder.decode('Transfer', log)).toThrow('is not an encoded address');
    });

    it('accepts an upper-case signature topic', () => {
      const valid = transferLog(ALICE, BOB, 1n, 100, 0);
      const log = { ...valid, topics: [`0x${TRANSFER_TOPIC.slice(2).toUpperCase()}`, ...valid.topics.slice(1)] };

      expect(decoder.decode('Transfer', log).amount).toBe(1n);
    });
  });

  it('exposes the topic to filter on', () => {
    expect(decoder.topicFor('Transfer')).toBe(TRANSFER_TOPIC);
    expect(decoder.layout('Burn').name).toBe('SupplyDecreased');
  });
});
