import { describe, it, expect } from 'vitest';
import {
  ExtractedRowSchema,
  TransactionRecordSchema,
  createTransaction,
  isEnriched,
  toTransactionRecord,
} from '@monthbook/types';

describe('ExtractedRowSchema', () => {
  it('should trim the description and clean the amount', () => {
    const row = ExtractedRowSchema.parse({
      date: '01/03/2024',
      description: '  UPI SWIGGY ',
      amount: '1,250.00',
      transaction_type: 'debit',
    });
    expect(row).toEqual({ date: '01/03/2024', description: 'UPI SWIGGY', amount: 1250, transaction_type: 'debit' });
  });

  it('should require the transaction type', () => {
    const result = ExtractedRowSchema.safeParse({ date: '05/03/2024', description: 'REFUND FROM STORE', amount: 120 });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['transaction_type']);
  });

  it('should turn an unreadable amount into null', () => {
    const row = ExtractedRowSchema.parse({ description: 'FEE', amount: 'n/a', transaction_type: 'credit' });
    expect(row.amount).toBeNull();
    expect(row.transaction_type).toBe('credit');
  });

  it('should reject a row without a description', () => {
    expect(ExtractedRowSchema.safeParse({ description: '   ', amount: 10 }).success).toBe(false);
  });

  it('should reject an unknown transaction type', () => {
    expect(ExtractedRowSchema.safeParse({ description: 'X', transaction_type: 'refund' }).success).toBe(false);
  });
});

describe('TransactionRecordSchema', () => {
  it('should default every optional field to null', () => {
    const record = TransactionRecordSchema.parse({ description: 'NEFT CR', transaction_type: 'credit' });
    expect(record).toEqual({
      date: null,
      description: 'NEFT CR',
      amount: null,
      source_account: null,
      transaction_type: 'credit',
      short_description: null,
      category: null,
      is_expense: null,
      is_split: null,
    });
  });

  it('should reject flags outside their range', () => {
    expect(
      TransactionRecordSchema.safeParse({ description: 'X', transaction_type: 'debit', is_split: 3 }).success
    ).toBe(false);
    expect(
      TransactionRecordSchema.safeParse({ description: 'X', transaction_type: 'debit', is_expense: 2 }).success
    ).toBe(false);
  });
});

describe('transaction helpers', () => {
  it('should create a transaction with unset enrichment fields', () => {
    const tx = createTransaction({ description: 'UBER TRIP', transactionType: 'debit', amount: 310 });
    expect(tx).toEqual({
      date: null,
      description: 'UBER TRIP',
      amount: 310,
      sourceAccount: null,
      transactionType: 'debit',
      shortDescription: null,
      category: null,
      isExpense: null,
      isSplit: null,
    });
    expect(isEnriched(tx)).toBe(false);
  });

  it('should write snake_case records', () => {
    const tx = createTransaction({
      description: 'UBER TRIP',
      transactionType: 'debit',
      sourceAccount: 'HDFC Savings',
      isExpense: 1,
      isSplit: 0,
    });
    const record = toTransactionRecord(tx);
    expect(record.source_account).toBe('HDFC Savings');
    expect(record.is_expense).toBe(1);
    expect(record.is_split).toBe(0);
    expect(record.transaction_type).toBe('debit');
  });
});
