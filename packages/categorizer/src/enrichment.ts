/**
 * Enrichment stage: one classifier call for the whole batch, results merged
 * back by `original_index`.
 */

import {
  FALLBACK_CATEGORY,
  describeError,
  isEnriched,
  resolveCategory,
  silentLogger,
  type Logger,
  type Transaction,
} from '@monthbook/types';
import {
  ClassificationBatchSchema,
  ClassifierError,
  type ClassificationRequestItem,
  type ClassifierFailure,
  type TransactionClassifier,
} from './classifier.js';

export type EnrichmentOutcome = 'classified' | ClassifierFailure;

export interface EnrichmentReport {
  outcome: EnrichmentOutcome;
  /** Transactions touched by at least one result. */
  updated: number;
  /** Transactions no result pointed at; left as they were. */
  unmatched: number;
  /** Results whose index fell outside the batch. */
  discarded: number;
  /** Set when the whole batch fell back to defaults. */
  failure?: ClassifierError;
}

export interface EnrichmentOptions {
  logger?: Logger;
}

export function buildClassificationRequest(transactions: readonly Transaction[]): ClassificationRequestItem[] {
  return transactions.map((tx, index) => ({
    index,
    date: tx.date ?? 'Unknown',
    description: tx.description,
    amount: tx.amount ?? 0,
  }));
}

function applyBatchFallback(transactions: Transaction[]): void {
  for (const tx of transactions) {
    tx.category = FALLBACK_CATEGORY;
    tx.isExpense = 1;
    tx.isSplit = 0;
  }
}

function failBatch(
  transactions: Transaction[],
  outcome: ClassifierFailure,
  detail: string,
  logger: Logger
): EnrichmentReport {
  logger.error(`Enrichment failed (${outcome}): ${detail}. Assigning ${FALLBACK_CATEGORY} to ${transactions.length} transactions`);
  applyBatchFallback(transactions);
  return { outcome, updated: 0, unmatched: 0, discarded: 0, failure: new ClassifierError(outcome, detail) };
}

/**
 * Classifies `transactions` in place.
 *
 * A failed batch (no classifier, classifier threw, reply of the wrong shape)
 * gives every transaction the fallback category, `isExpense = 1` and
 * `isSplit = 0`. Otherwise unmatched transactions keep their prior state.
 */
export async function enrichTransactions(
  transactions: Transaction[],
  classifier: TransactionClassifier | null,
  options: EnrichmentOptions = {}
): Promise<EnrichmentReport> {
  const logger = options.logger ?? silentLogger;

  if (transactions.length === 0) {
    logger.info('No transactions to classify');
    return { outcome: 'classified', updated: 0, unmatched: 0, discarded: 0 };
  }

  if (classifier === null) {
    return failBatch(transactions, 'not-configured', 'no classifier is configured', logger);
  }

  logger.info(`Classifying ${transactions.length} transactions with ${classifier.name}`);

  let reply: unknown;
  try {
    reply = await classifier.classify(buildClassificationRequest(transactions));
  } catch (err) {
    return failBatch(transactions, 'classifier-exception', describeError(err), logger);
  }

  const parsed = ClassificationBatchSchema.safeParse(reply);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue === undefined ? 'unexpected reply' : `${issue.path.join('.') || 'reply'}: ${issue.message}`;
    return failBatch(transactions, 'malformed-response', detail, logger);
  }

  const results = parsed.data.processed_transactions;
  if (results.length !== transactions.length) {
    logger.warn(`Classifier returned ${results.length} results for ${transactions.length} transactions`);
  }

  const touched = new Set<number>();
  let discarded = 0;
  for (const result of results) {
    const tx = transactions[result.original_index];
    if (tx === undefined) {
      discarded++;
      logger.warn(`Discarding classifier result with out-of-range index ${result.original_index}`);
      continue;
    }
    if (touched.has(result.original_index)) {
      logger.warn(`Classifier returned index ${result.original_index} more than once, keeping the last result`);
    }
    tx.category = resolveCategory(result.category_str, logger);
    tx.isExpense = result.is_expense;
    tx.isSplit = result.is_split;
    touched.add(result.original_index);
  }

  let unmatched = 0;
  transactions.forEach((tx, index) => {
    if (!touched.has(index)) {
      unmatched++;
      logger.warn(`Transaction ${index} not updated by classifier: ${tx.description}`);
    }
  });

  logger.info(`Classified ${touched.size} of ${transactions.length} transactions`);
  return { outcome: 'classified', updated: touched.size, unmatched, discarded };
}

/**
 * Fills anything enrichment left unset: fallback category, expense, not
 * split. Returns how many transactions needed a default.
 */
export function applyCategoryDefaults(transactions: Transaction[], logger: Logger = silentLogger): number {
  let defaulted = 0;
  for (const tx of transactions) {
    if (isEnriched(tx)) continue;
    defaulted++;
    tx.category ??= FALLBACK_CATEGORY;
    tx.isExpense ??= 1;
    tx.isSplit ??= 0;
  }
  if (defaulted > 0) {
    logger.warn(`Applied default category and flags to ${defaulted} transactions`);
  }
  return defaulted;
}

/** Keeps expenses; a missing flag counts as an expense. */
export function filterExpenses(transactions: readonly Transaction[], logger: Logger = silentLogger): Transaction[] {
  let assumed = 0;
  const expenses = transactions.filter((tx) => {
    if (tx.isExpense === null) {
      assumed++;
      return true;
    }
    return tx.isExpense === 1;
  });
  if (assumed > 0) {
    logger.warn(`${assumed} transactions had no expense flag and were kept as expenses`);
  }
  logger.info(`Kept ${expenses.length} of ${transactions.length} transactions as expenses`);
  return expenses;
}
