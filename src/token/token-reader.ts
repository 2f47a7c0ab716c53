import { Contract, ContractRunner, isError } from 'ethers';
import { classifyProviderError, describeError } from '../providers/error-classifier.js';
import { ProviderError, ValidationError } from '../utils/errors.js';
import { validateEthereumAddress } from '../utils/validation.js';

export const ERC20_READ_ABI = [
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address account) view returns (uint256)',
  'function owner() view returns (address)',
];

export interface TokenInfo {
  address: string;
  name: string;
  symbol: string;
  decimals: number;
  /** Base units */
  totalSupply: bigint;
}

export interface AccountBalance {
  address: string;
  balance: bigint;
}

export class TokenReader {
  private readonly contract: Contract;

  constructor(
    private readonly address: string,
    runner: ContractRunner
  ) {
    if (!validateEthereumAddress(address)) {
      throw new ValidationError(`Invalid token address: ${address}`);
    }
    this.contract = new Contract(address, ERC20_READ_ABI, runner);
  }

  async info(): Promise<TokenInfo> {
    const [name, symbol, decimals, totalSupply] = await Promise.all([
      this.call('name'),
      this.call('symbol'),
      this.call('decimals'),
      this.call('totalSupply'),
    ]);

    return {
      address: this.address,
      name: String(name),
      symbol: String(symbol),
      decimals: Number(decimals),
      totalSupply: BigInt(String(totalSupply)),
    };
  }

  async balanceOf(account: string): Promise<bigint> {
    if (!validateEthereumAddress(account)) {
      throw new ValidationError(`Invalid account address: ${account}`);
    }
    return BigInt(String(await this.call('balanceOf', account)));
  }

  async balancesOf(accounts: string[]): Promise<AccountBalance[]> {
    return Promise.all(
      accounts.map(async address => ({ address, balance: await this.balanceOf(address) }))
    );
  }

  /**
   * Owner of an Ownable token, or null when the contract has no `owner()`
   * (empty return data) or reverts on it.
   */
  async owner(): Promise<string | null> {
    try {
      const owner: unknown = await this.contract.getFunction('owner').staticCall();
      return String(owner);
    } catch (error) {
      if (isError(error, 'CALL_EXCEPTION') || isError(error, 'BAD_DATA')) {
        return null;
      }
      throw this.callFailed('owner', error);
    }
  }

  private async call(method: string, ...args: string[]): Promise<unknown> {
    try {
      const result: unknown = await this.contract.getFunction(method).staticCall(...args);
      return result;
    } catch (error) {
      throw this.callFailed(method, error);
    }
  }

  private callFailed(method: string, error: unknown): ProviderError {
    return new ProviderError(
      `${method}() call on ${this.address} failed: ${describeError(error)}`,
      { reason: classifyProviderError(error), cause: error }
    );
  }
}
