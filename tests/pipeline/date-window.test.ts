import { describe, it, expect } from 'vitest';
import { createTransaction, type Transaction } from '@monthbook/types';
import { dateWindow, filterByDateWindow } from '../../src/pipeline/date-window.js';
import { RecordingLogger } from '../helpers/logger.js';

const dated = (date: string | null): Transaction => createTransaction({ date, description: `TXN ${date ?? 'none'}`, transactionType: 'debit' });

describe('dateWindow', () => {
  it('should run from the 1st to the 2nd of the next month', () => {
    expect(dateWindow({ year: 2024, month: 3 })).toEqual({ start: '2024-03-01', end: '2024-04-02' });
  });

  it('should roll over the year for December', () => {
    expect(dateWindow({ year: 2023, month: 12 })).toEqual({ start: '2023-12-01', end: '2024-01-02' });
  });
});

describe('filterByDateWindow', () => {
  it('should keep the month plus two grace days', () => {
    const transactions = [
      dated('29/02/2024'),
      dated('01/03/2024'),
      dated('31/03/2024'),
      dated('02/04/2024'),
      dated('03/04/2024'),
    ];
    const result = filterByDateWindow(transactions, { year: 2024, month: 3 });

    expect(result.kept.map((tx) => tx.date)).toEqual(['01/03/2024', '31/03/2024', '02/04/2024']);
    expect(result.droppedOutOfRange).toBe(2);
    expect(result.droppedUndated).toBe(0);
    expect(result.failedOpen).toBe(false);
  });

  it('should count undated transactions separately', () => {
    const result = filterByDateWindow([dated(null), dated('someday'), dated('2024-03-10')], { year: 2024, month: 3 });
    expect(result.kept).toHaveLength(1);
    expect(result.droppedUndated).toBe(2);
    expect(result.droppedOutOfRange).toBe(0);
  });

  it('should accept December statements dated early January', () => {
    const result = filterByDateWindow([dated('02-Jan-2024'), dated('03-Jan-2024')], { year: 2023, month: 12 });
    expect(result.kept.map((tx) => tx.date)).toEqual(['02-Jan-2024']);
  });

  it('should keep everything when the filter itself fails', () => {
    const logger = new RecordingLogger();
    const broken: Transaction = {
      ...createTransaction({ description: 'BROKEN', transactionType: 'debit' }),
      get date(): string | null {
        throw new Error('date unavailable');
      },
    };
    const transactions = [dated('01/01/2020'), broken];
    const result = filterByDateWindow(transactions, { year: 2024, month: 3 }, logger);

    expect(result.failedOpen).toBe(true);
    expect(result.kept).toBe(transactions);
    expect(logger.messages('error')).toEqual([
      'Date filter failed, keeping all 2 transactions: date unavailable',
    ]);
  });

  it('should log the window and the counts', () => {
    const logger = new RecordingLogger();
    filterByDateWindow([dated('01/03/2024'), dated(null)], { year: 2024, month: 3 }, logger);
    expect(logger.messages('info')).toEqual([
      'Date window 2024-03-01..2024-04-02: kept 1, dropped 0 out of range and 1 without a date',
    ]);
  });
});
