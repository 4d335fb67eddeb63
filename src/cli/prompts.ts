import { createInterface } from 'readline/promises';
import { formatSheetDate, type Transaction } from '@monthbook/types';
import type { ReviewBatch, ReviewDecision, ReviewGate } from '@monthbook/pdf-extract';
import type { WriteSummary } from '../pipeline/runner.js';

export type Ask = (question: string) => Promise<string>;

/** Reads answers from stdin; prompts go to stderr so stdout stays clean. */
export async function askOnTerminal(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export function parseReviewAnswer(answer: string): ReviewDecision | null {
  switch (answer.trim().toLowerCase()) {
    case 'a':
    case 'accept':
    case 'y':
    case 'yes':
      return 'accept';
    case 'd':
    case 'discard':
      return 'discard';
    case 'q':
    case 'abort':
      return 'abort';
    default:
      return null;
  }
}

export function formatReviewLine(tx: Transaction): string {
  const date = formatSheetDate(tx.date) || (tx.date ?? '?');
  const amount = tx.amount === null ? '?' : tx.amount.toFixed(2);
  return `  ${date.padEnd(10)}  ${tx.transactionType.padEnd(6)}  ${amount.padStart(12)}  ${tx.description}`;
}

/** Shows each extracted document's rows and asks whether to keep them. */
export function createTerminalReviewGate(ask: Ask = askOnTerminal): ReviewGate {
  return {
    async review(batch: ReviewBatch): Promise<ReviewDecision> {
      console.error('');
      console.error(`=== ${batch.fileName} -> ${batch.sourceAccount} (${batch.transactions.length} transactions) ===`);
      for (const tx of batch.transactions) {
        console.error(formatReviewLine(tx));
      }
      for (;;) {
        const decision = parseReviewAnswer(await ask('[a]ccept, [d]iscard, or [q] abort the run? '));
        if (decision !== null) return decision;
        console.error('[WARN] Please answer a, d or q');
      }
    },
  };
}

export function createTerminalConfirm(ask: Ask = askOnTerminal): (summary: WriteSummary) => Promise<boolean> {
  return async (summary) => {
    console.error('');
    console.error(`[INFO] Ready to write ${summary.transactionCount} transactions (${summary.expenseCount} expenses)`);
    console.error(`[INFO] Review the categorized data in: ${summary.checkpointFile}`);
    const answer = await ask('Proceed with writing these transactions to Google Sheets? (yes/no): ');
    return answer.trim().toLowerCase() === 'yes';
  };
}
