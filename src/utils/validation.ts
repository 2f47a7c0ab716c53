import { z } from 'zod';

export const ethereumAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid Ethereum address format');

export const transactionHashSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, 'Invalid transaction hash format');

export const blockNumberSchema = z.number().int().nonnegative();

export const pageSizeSchema = z.number().int().positive();

export const urlSchema = z.string().url('Invalid URL format');

export function validateEthereumAddress(address: string): boolean {
  return ethereumAddressSchema.safeParse(address).success;
}

export function validateTransactionHash(hash: string): boolean {
  return transactionHashSchema.safeParse(hash).success;
}

export function validateBlockNumber(blockNumber: number): boolean {
  return blockNumberSchema.safeParse(blockNumber).success;
}

export function validatePageSize(pageSize: number): boolean {
  return pageSizeSchema.safeParse(pageSize).success;
}
