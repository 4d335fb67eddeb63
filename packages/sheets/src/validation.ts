import { VALIDATION_CATEGORIES, type Parties } from '@monthbook/types';
import type { ListValidation } from './document.js';
import { FIRST_DATA_ROW, LEDGER_COLUMNS } from './layout.js';

export const EXPENSE_FLAG_VALUES: readonly string[] = ['0', '1'];
export const SPLIT_FLAG_VALUES: readonly string[] = ['0', '1', '2'];

/** Dropdowns for the category, expense and split columns of rows 2..`lastRow`. */
export function ledgerValidations(lastRow: number, parties: Parties): ListValidation[] {
  const base = { startRow: FIRST_DATA_ROW, endRow: lastRow, strict: true, showCustomUi: true };
  return [
    {
      ...base,
      column: LEDGER_COLUMNS.category,
      values: VALIDATION_CATEGORIES,
      inputMessage: 'Select a category',
    },
    {
      ...base,
      column: LEDGER_COLUMNS.isExpense,
      values: EXPENSE_FLAG_VALUES,
      inputMessage: 'Enter 0 (Income/Transfer) or 1 (Expense)',
    },
    {
      ...base,
      column: LEDGER_COLUMNS.isSplit,
      values: SPLIT_FLAG_VALUES,
      inputMessage: `Select 0 (No), 1 (Split 50/50), or 2 (${parties.secondary} Only)`,
    },
  ];
}
