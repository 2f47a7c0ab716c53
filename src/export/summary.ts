import { TransferGraph } from '../analysis/graph.js';
import { ActivityReport } from '../analysis/report.js';
import { AddressTotal } from '../analysis/volume.js';
import { TransactionDetails } from '../providers/transaction-reader.js';
import { AddressBook } from './address-book.js';
import { formatAmount } from './format.js';

export interface SummaryOptions {
  decimals: number;
  symbol: string;
  addressBook?: AddressBook;
}

function formatSigned(amount: bigint, decimals: number): string {
  return amount < 0n ? `-${formatAmount(-amount, decimals)}` : `+${formatAmount(amount, decimals)}`;
}

export function formatGraph(graph: TransferGraph, options: SummaryOptions): string {
  const book = options.addressBook ?? new AddressBook();

  if (graph.edges.length === 0) {
    return 'No transfers above the threshold';
  }

  const lines = [`${graph.nodes.length} addresses, ${graph.edges.length} edges`];
  for (const edge of graph.edges) {
    lines.push(
      `${book.label(edge.from)} -> ${book.label(edge.to)}: ` +
      `${formatAmount(edge.totalAmount, options.decimals)} ${options.symbol} in ${edge.count} transfer(s)`
    );
  }
  return lines.join('\n');
}

function formatTotals(title: string, totals: AddressTotal[], options: SummaryOptions, book: AddressBook): string[] {
  if (totals.length === 0) {
    return [];
  }
  return [
    title,
    ...totals.map((total, rank) =>
      `  ${rank + 1}. ${book.label(total.address)}  ${formatAmount(total.volume, options.decimals)} ${options.symbol} (${total.count})`
    ),
  ];
}

export function formatReport(report: ActivityReport, options: SummaryOptions): string {
  const book = options.addressBook ?? new AddressBook();
  const { decimals, symbol } = options;

  const lines = [
    `Blocks ${report.fromBlock}-${report.toBlock}`,
    `  Transfers: ${report.counts.Transfer} (${formatAmount(report.transferVolume, decimals)} ${symbol})`,
    `  Mints:     ${report.counts.Mint} (${formatAmount(report.minted, decimals)} ${symbol})`,
    `  Burns:     ${report.counts.Burn} (${formatAmount(report.burned, decimals)} ${symbol})`,
    `  Approvals: ${report.counts.Approval} (${report.unlimitedApprovals} unlimited)`,
    `  Net supply change: ${formatSigned(report.netSupplyChange, decimals)} ${symbol}`,
    ...formatTotals('Top senders', report.topSenders, options, book),
    ...formatTotals('Top recipients', report.topRecipients, options, book),
  ];

  if (report.busiestBlocks.length > 0) {
    lines.push('Busiest blocks');
    for (const block of report.busiestBlocks) {
      lines.push(`  ${block.blockNumber}: ${block.count} transfer(s), ${formatAmount(block.volume, decimals)} ${symbol}`);
    }
  }

  return lines.join('\n');
}

export function formatTransaction(details: TransactionDetails, addressBook: AddressBook = new AddressBook()): string {
  const lines = [
    `Transaction: ${details.hash}`,
    `Status: ${details.status}`,
    `Block: ${details.blockNumber ?? 'pending'}`,
    `From: ${addressBook.label(details.from)}`,
    `To: ${details.to === null ? 'none' : addressBook.label(details.to)}`,
    `Value: ${formatAmount(details.value, 18)} ETH`,
    `Nonce: ${details.nonce}`,
    `Gas limit: ${details.gasLimit}`,
    `Gas price: ${formatAmount(details.gasPrice, 9)} gwei`,
  ];

  if (details.gasUsed !== null && details.fee !== null) {
    lines.push(`Gas used: ${details.gasUsed}`, `Fee: ${formatAmount(details.fee, 18)} ETH`, `Logs: ${details.logCount}`);
  }

  return lines.join('\n');
}
