import { DecodedEvent } from '../core/types.js';
import { AddressBook } from './address-book.js';
import { formatAmount, formatTimestamp } from './format.js';

export interface TableOptions {
  decimals: number;
  symbol: string;
  addressBook?: AddressBook;
  timestamps?: ReadonlyMap<number, number>;
}

export function formatEventTable(events: readonly DecodedEvent[], options: TableOptions): string {
  const book = options.addressBook ?? new AddressBook();
  const withTime = options.timestamps !== undefined;

  const header = [
    'BLOCK',
    ...(withTime ? ['TIME'] : []),
    'KIND',
    'TX',
    'FROM',
    'TO',
    `AMOUNT (${options.symbol})`,
  ];

  const rows = events.map(event => [
    String(event.blockNumber),
    ...(withTime ? [formatTimestamp(options.timestamps?.get(event.blockNumber))] : []),
    event.kind === 'Approval' && event.unlimited ? 'Approval*' : event.kind,
    `${event.transactionHash.slice(0, 10)}...`,
    book.label(event.fromAddress),
    book.label(event.toAddress),
    formatAmount(event.amount, options.decimals),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map(row => row[column].length))
  );

  const render = (row: string[]) =>
    row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  const lines = [render(header), render(widths.map(width => '-'.repeat(width))), ...rows.map(render)];

  if (events.some(event => event.kind === 'Approval' && event.unlimited)) {
    lines.push('', '* unlimited allowance');
  }

  return lines.join('\n');
}
