import { getAddress, isAddress } from 'ethers';
import { ConfigError } from '../utils/errors.js';

export function shortenAddress(address: string): string {
  const checksummed = isAddress(address) ? getAddress(address) : address;
  return `${checksummed.slice(0, 6)}...${checksummed.slice(-4)}`;
}

/**
 * Human labels for well-known addresses (exchanges, the token contract).
 */
export class AddressBook {
  private readonly labels = new Map<string, string>();

  constructor(labels: Record<string, string> = {}) {
    for (const [address, label] of Object.entries(labels)) {
      if (!isAddress(address)) {
        throw new ConfigError(`Invalid address in labels: ${address}`);
      }
      this.labels.set(getAddress(address), label);
    }
  }

  lookup(address: string): string | undefined {
    return isAddress(address) ? this.labels.get(getAddress(address)) : undefined;
  }

  /**
   * "Label (0x1234...abcd)" for known addresses, the short form otherwise
   */
  label(address: string): string {
    const known = this.lookup(address);
    return known ? `${known} (${shortenAddress(address)})` : shortenAddress(address);
  }

  get size(): number {
    return this.labels.size;
  }
}
