import dayjs from 'dayjs';
import {
  describeError,
  parseStatementDate,
  silentLogger,
  type AccountingMonth,
  type Logger,
  type Transaction,
} from '@monthbook/types';

/** Days of the following month still counted, for statements that close late. */
export const GRACE_DAYS = 2;

export interface DateWindow {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

export interface DateWindowResult {
  kept: Transaction[];
  droppedOutOfRange: number;
  droppedUndated: number;
  /** The filter hit an internal error and returned its input unchanged. */
  failedOpen: boolean;
}

export function dateWindow(month: AccountingMonth): DateWindow {
  const start = dayjs(new Date(month.year, month.month - 1, 1));
  const end = start.add(1, 'month').date(GRACE_DAYS);
  return { start: start.format('YYYY-MM-DD'), end: end.format('YYYY-MM-DD') };
}

export function filterByDateWindow(
  transactions: Transaction[],
  month: AccountingMonth,
  logger: Logger = silentLogger
): DateWindowResult {
  try {
    const window = dateWindow(month);
    const kept: Transaction[] = [];
    let droppedOutOfRange = 0;
    let droppedUndated = 0;

    for (const tx of transactions) {
      const parsed = parseStatementDate(tx.date);
      if (parsed === null) {
        droppedUndated++;
        logger.debug(`No usable date on '${tx.description}' (${tx.date ?? 'none'})`);
        continue;
      }
      const day = parsed.format('YYYY-MM-DD');
      if (day < window.start || day > window.end) {
        droppedOutOfRange++;
        continue;
      }
      kept.push(tx);
    }

    logger.info(
      `Date window ${window.start}..${window.end}: kept ${kept.length}, ` +
        `dropped ${droppedOutOfRange} out of range and ${droppedUndated} without a date`
    );
    return { kept, droppedOutOfRange, droppedUndated, failedOpen: false };
  } catch (err) {
    logger.error(`Date filter failed, keeping all ${transactions.length} transactions: ${describeError(err)}`);
    return { kept: transactions, droppedOutOfRange: 0, droppedUndated: 0, failedOpen: true };
  }
}
