import { z } from 'zod';
import { ExpenseFlagSchema, SplitFlagSchema } from '@monthbook/types';

/** One line of the batch sent to a classifier; `index` is echoed back as `original_index`. */
export interface ClassificationRequestItem {
  index: number;
  date: string;
  description: string;
  amount: number;
}

/**
 * Anything that can classify a whole batch in one call. The reply is
 * returned raw and validated against {@link ClassificationBatchSchema} by
 * the enrichment stage.
 */
export interface TransactionClassifier {
  readonly name: string;
  classify(items: readonly ClassificationRequestItem[]): Promise<unknown>;
}

/** Integers sometimes come back as `"1"` or `true`. */
const intLike = (value: unknown): unknown => {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number(value);
  return value;
};

export const ClassificationResultSchema = z.object({
  original_index: z.preprocess(intLike, z.number().int()),
  category_str: z.string(),
  is_expense: z.preprocess(intLike, ExpenseFlagSchema),
  is_split: z.preprocess(intLike, SplitFlagSchema),
});
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

export const ClassificationBatchSchema = z.object({
  processed_transactions: z.array(ClassificationResultSchema),
});
export type ClassificationBatch = z.infer<typeof ClassificationBatchSchema>;

export type ClassifierFailure = 'not-configured' | 'malformed-response' | 'classifier-exception';

export class ClassifierError extends Error {
  readonly code: ClassifierFailure;

  constructor(code: ClassifierFailure, message: string) {
    super(message);
    this.name = 'ClassifierError';
    this.code = code;
  }
}
