import { UNASSIGNED_ACCOUNT_NAMES, type Parties, type Transaction } from '@monthbook/types';

export const CASH_SHEET = 'Cash';
export const FINAL_RECON_SHEET = 'Final Recon';
export const REPORTING_SHEET = 'Reporting';
/** Title Google gives the only tab of a new spreadsheet. */
export const DEFAULT_SHEET_TITLE = 'Sheet1';

/** Ledger columns A..I; rows and columns are 1-based. */
export const LEDGER_COLUMNS = {
  date: 1,
  isExpense: 2,
  category: 3,
  shortDescription: 4,
  description: 5,
  cost: 6,
  isSplit: 7,
  primaryShare: 8,
  secondaryShare: 9,
} as const;

export const LEDGER_LAST_COLUMN = LEDGER_COLUMNS.secondaryShare;
export const FIRST_DATA_ROW = 2;

/**
 * - `secondary-ledger`: the secondary party's own ledger (its own formula variant)
 * - `ledger`: Cash and every account sheet
 * - `recon`: the cross-account Final Recon sheet
 * - `reporting`: left to the user, no header
 */
export type SheetRole = 'ledger' | 'secondary-ledger' | 'recon' | 'reporting';

export function sheetRole(title: string, parties: Parties): SheetRole {
  if (title === parties.secondary) return 'secondary-ledger';
  if (title === FINAL_RECON_SHEET) return 'recon';
  if (title === REPORTING_SHEET) return 'reporting';
  return 'ledger';
}

export function isLedgerRole(role: SheetRole): boolean {
  return role === 'ledger' || role === 'secondary-ledger';
}

export function ledgerHeaders(parties: Parties): string[] {
  return [
    'Txn Date',
    'is Expense',
    'Category',
    'Short Description',
    'Description',
    'Cost',
    'Is Split',
    parties.primary,
    parties.secondary,
  ];
}

export function reconHeaders(parties: Parties): string[] {
  return [
    'Source',
    'Category',
    `${parties.primary} Expense`,
    `${parties.secondary} Expense`,
    'Description',
    'Actual Amount',
    '',
    'Category Heading',
    parties.primary,
    parties.secondary,
    'Actual amount',
  ];
}

export function headersFor(role: SheetRole, parties: Parties): string[] | null {
  switch (role) {
    case 'ledger':
    case 'secondary-ledger':
      return ledgerHeaders(parties);
    case 'recon':
      return reconHeaders(parties);
    case 'reporting':
      return null;
  }
}

export function isAssignedAccount(account: string | null): account is string {
  return account !== null && !UNASSIGNED_ACCOUNT_NAMES.includes(account.trim());
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Tab order for the workbook: Cash, the secondary party's ledger, Final Recon,
 * Reporting, then every account seen in the batch, sorted.
 */
export function buildTargetSheets(transactions: readonly Transaction[], parties: Parties): string[] {
  const fixed = [CASH_SHEET, parties.secondary, FINAL_RECON_SHEET, REPORTING_SHEET];
  const target = [...new Set(fixed)];

  const accounts = new Set<string>();
  for (const tx of transactions) {
    if (isAssignedAccount(tx.sourceAccount)) accounts.add(tx.sourceAccount);
  }
  for (const account of [...accounts].sort(byCodePoint)) {
    if (!target.includes(account)) target.push(account);
  }
  return target;
}
