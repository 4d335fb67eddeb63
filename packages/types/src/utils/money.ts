import type { TransactionType } from '../schemas/transaction.js';

/**
 * Coerces a statement amount to a number. Strings are stripped of
 * everything but digits, `.` and `-` first, so `"₹1,234.50"` reads as
 * 1234.5. Anything that still fails to parse is null.
 */
export function cleanAmount(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[^\d.-]/g, '');
  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

/** Ledger sign convention: money out is positive, money in is negative. */
export function signedAmount(amount: number | null, type: TransactionType): number | null {
  if (amount === null) return null;
  const magnitude = Math.abs(amount);
  return type === 'credit' ? -magnitude : magnitude;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
