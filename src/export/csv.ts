import { DecodedEvent } from '../core/types.js';
import { formatAmount, formatTimestamp } from './format.js';

export const CSV_COLUMNS = [
  'kind',
  'block',
  'timestamp',
  'transaction_hash',
  'log_index',
  'from',
  'to',
  'amount_raw',
  'amount',
  'unlimited',
] as const;

export interface CsvOptions {
  decimals: number;
  /** Block number -> unix seconds */
  timestamps?: ReadonlyMap<number, number>;
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map(row => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

export function eventsToCsv(events: readonly DecodedEvent[], options: CsvOptions): string {
  const rows = events.map(event => [
    event.kind,
    String(event.blockNumber),
    formatTimestamp(options.timestamps?.get(event.blockNumber)),
    event.transactionHash,
    String(event.logIndex),
    event.fromAddress,
    event.toAddress,
    event.amount.toString(),
    formatAmount(event.amount, options.decimals),
    event.kind === 'Approval' ? String(event.unlimited) : '',
  ]);

  return toCsv([[...CSV_COLUMNS], ...rows]);
}
