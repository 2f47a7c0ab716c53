import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseConfig } from '../../../src/cli/config.js';
import { createContext, redactUrl } from '../../../src/cli/context.js';
import { createSilentLogger } from '../../../src/utils/logger.js';
import { TOKEN_ADDRESS } from '../../fixtures/logs.js';

describe('createContext', () => {
  const config = parseConfig(`
rpc:
  url: "http://localhost:8545"
fetch:
  min_page_size: 10
`);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('wires the readers to one provider', () => {
    const context = createContext(config, createSilentLogger());

    try {
      expect(context.fetcher.size).toBe(0);
      expect(context.addressBook.size).toBe(0);
      expect(context.source.rpc).toBeDefined();
    } finally {
      context.close();
    }
  });

  it('clamps the minimum page size to a smaller page size override', async () => {
    const context = createContext(config, createSilentLogger(), { pageSize: 5 });

    try {
      const getLogs = vi.spyOn(context.source.rpc, 'getLogs').mockResolvedValue([]);

      const result = await context.fetcher.fetch(TOKEN_ADDRESS, 'Transfer', 0, 9);

      expect(result.pages).toBe(2);
      expect(getLogs).toHaveBeenCalledTimes(2);
      expect(getLogs).toHaveBeenNthCalledWith(1, expect.objectContaining({ fromBlock: 0, toBlock: 4 }));
      expect(getLogs).toHaveBeenNthCalledWith(2, expect.objectContaining({ fromBlock: 5, toBlock: 9 }));
    } finally {
      context.close();
    }
  });
});

describe('redactUrl', () => {
  it('drops the path that may carry an API key', () => {
    expect(redactUrl('https://eth-mainnet.example.com/v2/test-key')).toBe('https://eth-mainnet.example.com/...');
  });

  it('keeps the port', () => {
    expect(redactUrl('http://localhost:8545')).toBe('http://localhost:8545/...');
  });

  it('flags unparseable URLs', () => {
    expect(redactUrl('not a url')).toBe('<invalid url>');
  });
});
