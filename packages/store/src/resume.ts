import type { Transaction } from '@monthbook/types';
import type { CheckpointStore } from './checkpoint-store.js';

/**
 * Where a run picks up:
 * - `fresh`: nothing usable on disk, extract from sources
 * - `extracted`: raw transactions saved, enrichment still pending
 * - `categorized`: enriched transactions saved, go straight to the workbook
 */
export type ResumePoint =
  | { stage: 'fresh' }
  | { stage: 'extracted'; transactions: Transaction[] }
  | { stage: 'categorized'; transactions: Transaction[] };

export type ResumeStage = ResumePoint['stage'];

export function resolveResumePoint(store: Pick<CheckpointStore, 'load'>): ResumePoint {
  const categorized = store.load('categorized');
  if (categorized !== null && categorized.length > 0) {
    return { stage: 'categorized', transactions: categorized };
  }

  const extracted = store.load('extraction');
  if (extracted !== null && extracted.length > 0) {
    return { stage: 'extracted', transactions: extracted };
  }

  return { stage: 'fresh' };
}

export function describeResumePoint(point: ResumePoint): string {
  switch (point.stage) {
    case 'fresh':
      return 'No checkpoint found, starting from the statement sources';
    case 'extracted':
      return `Resuming from extraction checkpoint (${point.transactions.length} transactions)`;
    case 'categorized':
      return `Resuming from categorized checkpoint (${point.transactions.length} transactions)`;
  }
}
