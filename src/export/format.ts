import { formatUnits } from 'ethers';

export function formatAmount(amount: bigint, decimals: number): string {
  return formatUnits(amount, decimals);
}

export function formatTimestamp(timestamp: number | undefined): string {
  return timestamp === undefined ? '' : new Date(timestamp * 1000).toISOString();
}
