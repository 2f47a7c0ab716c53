import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BlockClock } from '../../../src/core/block-clock.js';
import { createSilentLogger } from '../../../src/utils/logger.js';
import { FakeLogSource } from '../../fixtures/fake-source.js';

describe('BlockClock', () => {
  let source: FakeLogSource;
  let logger: ReturnType<typeof createSilentLogger>;

  beforeEach(() => {
    source = new FakeLogSource();
    source.timestamps.set(100, 1700000000);
    source.timestamps.set(101, 1700000012);
    source.timestamps.set(102, 1700000024);
    logger = createSilentLogger();
  });

  it('resolves each unique block once', async () => {
    const clock = new BlockClock(source, logger);

    const resolved = await clock.resolve([101, 100, 101, 100]);

    expect(source.timestampCalls).toEqual([101, 100]);
    expect([...resolved.entries()]).toEqual([[101, 1700000012], [100, 1700000000]]);
  });

  it('memoises timestamps across calls', async () => {
    const clock = new BlockClock(source, logger);

    await clock.resolve([100, 101]);
    const resolved = await clock.resolve([101, 102]);

    expect(source.timestampCalls).toEqual([100, 101, 102]);
    expect(resolved.get(101)).toBe(1700000012);
    expect(resolved.get(102)).toBe(1700000024);
    expect(resolved.has(100)).toBe(false);
  });

  it('retries a failing lookup', async () => {
    source.timestampFailures.set(100, 2);
    const clock = new BlockClock(source, logger, { retries: 3, minTimeout: 1, maxTimeout: 1 });
    const warn = vi.spyOn(logger, 'warn');

    const resolved = await clock.resolve([100]);

    expect(resolved.get(100)).toBe(1700000000);
    expect(source.timestampCalls).toEqual([100, 100, 100]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith(
      expect.objectContaining({ attempt: 2 }),
      'Retrying getBlock(100)'
    );
  });

  it('gives up after the configured retries', async () => {
    source.timestampFailures.set(100, 5);
    const clock = new BlockClock(source, logger, { retries: 1, minTimeout: 1, maxTimeout: 1 });

    await expect(clock.resolve([100])).rejects.toThrow('temporary failure for block 100');
    expect(source.timestampCalls).toEqual([100, 100]);
  });

  it('returns an empty map for no blocks', async () => {
    const clock = new BlockClock(source, logger);

    const resolved = await clock.resolve([]);

    expect(resolved.size).toBe(0);
    expect(source.timestampCalls).toEqual([]);
  });
});
