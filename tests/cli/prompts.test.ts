import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTransaction } from '@monthbook/types';
import {
  createTerminalConfirm,
  createTerminalReviewGate,
  formatReviewLine,
  parseReviewAnswer,
} from '../../src/cli/prompts.js';

function scripted(...answers: string[]): { ask: (question: string) => Promise<string>; questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    ask: (question) => {
      questions.push(question);
      return Promise.resolve(answers.shift() ?? '');
    },
  };
}

describe('parseReviewAnswer', () => {
  it.each([
    ['a', 'accept'],
    ['Accept', 'accept'],
    [' y ', 'accept'],
    ['yes', 'accept'],
    ['d', 'discard'],
    ['DISCARD', 'discard'],
    ['q', 'abort'],
    ['abort', 'abort'],
  ])('should read %s as %s', (answer, decision) => {
    expect(parseReviewAnswer(answer)).toBe(decision);
  });

  it('should return null for anything else', () => {
    expect(parseReviewAnswer('maybe')).toBeNull();
    expect(parseReviewAnswer('')).toBeNull();
  });
});

describe('formatReviewLine', () => {
  it('should align date, type and amount', () => {
    const tx = createTransaction({ date: '2024-03-05', description: 'SWIGGY', amount: 450, transactionType: 'debit' });
    expect(formatReviewLine(tx)).toBe(`  05/03/2024  debit ${' '.repeat(2 + 6)}450.00  SWIGGY`);
  });

  it('should show unknown values as question marks', () => {
    const tx = createTransaction({ description: 'FEE', transactionType: 'credit' });
    expect(formatReviewLine(tx)).toBe(`  ?${' '.repeat(9 + 2)}credit${' '.repeat(2 + 11)}?  FEE`);
  });
});

describe('terminal prompts', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should ask again until the review answer is valid', async () => {
    const { ask, questions } = scripted('maybe', 'd');
    const gate = createTerminalReviewGate(ask);
    const decision = await gate.review({ fileName: 'march.pdf', sourceAccount: 'Cash', transactions: [] });
    expect(decision).toBe('discard');
    expect(questions).toHaveLength(2);
  });

  it('should only confirm on yes', async () => {
    const summary = {
      month: { year: 2024, month: 3 },
      resumedFrom: 'fresh' as const,
      transactionCount: 2,
      expenseCount: 1,
      checkpointFile: 'categorized_transactions.json',
    };
    expect(await createTerminalConfirm(scripted(' YES ').ask)(summary)).toBe(true);
    expect(await createTerminalConfirm(scripted('y').ask)(summary)).toBe(false);
  });
});
