export {
  APP_VERSION,
  UNKNOWN_ACCOUNT,
  UNASSIGNED_ACCOUNT_NAMES,
  DEFAULT_ACCOUNT_NAMES,
  DEFAULT_PARTIES,
  CHECKPOINT_FILES,
  type Parties,
} from './constants.js';
export {
  STATEMENT_DATE_FORMATS,
  SHEET_DATE_FORMAT,
  parseStatementDate,
  formatSheetDate,
  previousMonth,
  parseAccountingMonth,
  monthName,
  type AccountingMonth,
} from './date.js';
export { cleanAmount, signedAmount, roundToTwoDecimals, sumAmounts } from './money.js';
