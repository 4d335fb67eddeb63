import { formatSheetDate, signedAmount, type Transaction } from '@monthbook/types';
import type { CellValue } from './document.js';

/**
 * Columns A..G of a ledger row. H and I are formulas written separately.
 * Missing values become empty cells.
 */
export function buildLedgerRow(tx: Transaction): CellValue[] {
  return [
    formatSheetDate(tx.date),
    tx.isExpense ?? '',
    tx.category ?? '',
    tx.shortDescription ?? '',
    tx.description,
    signedAmount(tx.amount, tx.transactionType) ?? '',
    tx.isSplit ?? '',
  ];
}

export function buildLedgerRows(transactions: readonly Transaction[]): CellValue[][] {
  return transactions.map(buildLedgerRow);
}

/** Groups by source account in first-seen order; a missing account groups under `''`. */
export function groupByAccount(transactions: readonly Transaction[]): Map<string, Transaction[]> {
  const groups = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    const key = tx.sourceAccount ?? '';
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [tx]);
    } else {
      group.push(tx);
    }
  }
  return groups;
}
