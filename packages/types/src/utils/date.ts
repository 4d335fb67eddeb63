import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

/**
 * Accepted statement date formats, tried in order. The single-digit
 * variants sit beside their padded forms because strict parsing rejects
 * `5/01/2024` against `DD/MM/YYYY`.
 */
export const STATEMENT_DATE_FORMATS = [
  'YYYY-MM-DD',
  'DD/MM/YYYY',
  'D/M/YYYY',
  'DD-MMM-YYYY',
  'D-MMM-YYYY',
  'MMM DD, YYYY',
  'MMM D, YYYY',
  'DD/MM/YYYY HH:mm:ss',
  'DD-MMM-YY',
] as const;

export const SHEET_DATE_FORMAT = 'DD/MM/YYYY';

/** `JAN`/`jan` → `Jan`, since strict month-name parsing is case-sensitive. */
function titleCaseMonthNames(value: string): string {
  return value.replace(/[A-Za-z]{3,}/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Parses a statement date against {@link STATEMENT_DATE_FORMATS}.
 * Returns null for null, blank or unrecognised input.
 */
export function parseStatementDate(value: string | null | undefined): Dayjs | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const candidate = titleCaseMonthNames(trimmed);
  for (const format of STATEMENT_DATE_FORMATS) {
    const parsed = dayjs(candidate, format, true);
    if (parsed.isValid()) return parsed;
  }
  return null;
}

/** `DD/MM/YYYY` for the ledger, `''` when the date cannot be read. */
export function formatSheetDate(value: string | null | undefined): string {
  const parsed = parseStatementDate(value);
  return parsed === null ? '' : parsed.format(SHEET_DATE_FORMAT);
}

export interface AccountingMonth {
  year: number;
  /** 1-12 */
  month: number;
}

/** The calendar month before `today`. */
export function previousMonth(today: Date = new Date()): AccountingMonth {
  const prev = dayjs(today).startOf('month').subtract(1, 'month');
  return { year: prev.year(), month: prev.month() + 1 };
}

export function parseAccountingMonth(value: string): AccountingMonth {
  const match = /^(\d{4})-(\d{1,2})$/.exec(value.trim());
  if (match === null) {
    throw new Error(`Invalid month '${value}', expected YYYY-MM`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new Error(`Invalid month '${value}', month must be 1-12`);
  }
  return { year, month };
}

/** `January`, `February`, … */
export function monthName(month: AccountingMonth): string {
  return dayjs(new Date(month.year, month.month - 1, 1)).format('MMMM');
}
