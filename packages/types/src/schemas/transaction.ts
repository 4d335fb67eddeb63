import { z } from 'zod';
import type { Category } from '../categories/vocabulary.js';
import { cleanAmount } from '../utils/money.js';

export const TransactionTypeSchema = z.enum(['credit', 'debit']);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

export const ExpenseFlagSchema = z.union([z.literal(0), z.literal(1)]);
export type ExpenseFlag = z.infer<typeof ExpenseFlagSchema>;

/** 0 = not split, 1 = split evenly, 2 = all on the secondary party. */
export const SplitFlagSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);
export type SplitFlag = z.infer<typeof SplitFlagSchema>;

/**
 * One statement line. Extraction fills `date`, `description`, `amount`,
 * `transactionType` and `sourceAccount`; enrichment fills the rest in place.
 */
export interface Transaction {
  date: string | null;
  description: string;
  /** Positive magnitude as printed on the statement. */
  amount: number | null;
  sourceAccount: string | null;
  transactionType: TransactionType;
  shortDescription: string | null;
  category: Category | null;
  isExpense: ExpenseFlag | null;
  isSplit: SplitFlag | null;
}

export type EnrichedTransaction = Transaction & {
  category: Category;
  isExpense: ExpenseFlag;
  isSplit: SplitFlag;
};

const AmountSchema = z
  .union([z.number(), z.string()])
  .nullable()
  .optional()
  .transform((value) => cleanAmount(value));

/** A statement line as the page transcriber returns it. */
export const ExtractedRowSchema = z.object({
  date: z.string().nullable().optional(),
  description: z.string().trim().min(1),
  amount: AmountSchema,
  transaction_type: TransactionTypeSchema,
});
export type ExtractedRow = z.infer<typeof ExtractedRowSchema>;

/**
 * Checkpoint representation: snake_case keys, category kept as the raw
 * display string so it can be re-resolved on load.
 */
export const TransactionRecordSchema = z.object({
  date: z.string().nullable().default(null),
  description: z.string().min(1),
  amount: AmountSchema,
  source_account: z.string().nullable().default(null),
  transaction_type: TransactionTypeSchema,
  short_description: z.string().nullable().default(null),
  category: z.string().nullable().default(null),
  is_expense: ExpenseFlagSchema.nullable().default(null),
  is_split: SplitFlagSchema.nullable().default(null),
});
export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

export function createTransaction(
  fields: Pick<Transaction, 'description' | 'transactionType'> & Partial<Transaction>
): Transaction {
  return {
    date: null,
    amount: null,
    sourceAccount: null,
    shortDescription: null,
    category: null,
    isExpense: null,
    isSplit: null,
    ...fields,
  };
}

export function toTransactionRecord(tx: Transaction): TransactionRecord {
  return {
    date: tx.date,
    description: tx.description,
    amount: tx.amount,
    source_account: tx.sourceAccount,
    transaction_type: tx.transactionType,
    short_description: tx.shortDescription,
    category: tx.category,
    is_expense: tx.isExpense,
    is_split: tx.isSplit,
  };
}

export function isEnriched(tx: Transaction): tx is EnrichedTransaction {
  return tx.category !== null && tx.isExpense !== null && tx.isSplit !== null;
}
