/**
 * Sheet reconciliation: sync the tab set, then for each tab write its
 * header, its account's rows, the split formulas and the dropdowns.
 * A failure on one tab is logged and that tab is skipped.
 */

import {
  DEFAULT_PARTIES,
  describeError,
  signedAmount,
  silentLogger,
  sumAmounts,
  type Logger,
  type Parties,
  type Transaction,
} from '@monthbook/types';
import { SpreadsheetApiError, type SpreadsheetDocument } from './document.js';
import { computeSplitShares, splitShareCells } from './formulas.js';
import {
  FIRST_DATA_ROW,
  LEDGER_LAST_COLUMN,
  buildTargetSheets,
  headersFor,
  isLedgerRole,
  sheetRole,
  type SheetRole,
} from './layout.js';
import { columnLetter } from './a1.js';
import { RECON_FORMULA_RANGES, finalReconFormulas } from './recon.js';
import { buildLedgerRows, groupByAccount } from './rows.js';
import { applySheetSync, type SheetSyncResult } from './sync.js';
import { ledgerValidations } from './validation.js';

export interface ReconcileOptions {
  parties?: Parties;
  /** Write the Final Recon aggregation formulas (off by default). */
  reconFormulas?: boolean;
  logger?: Logger;
}

export interface SheetReport {
  title: string;
  role: SheetRole;
  rowsWritten: number;
  /** Sum of the primary party's shares, as the H formulas will show it. */
  primaryTotal: number;
  secondaryTotal: number;
}

export interface WorkbookReport {
  spreadsheetUrl: string;
  targetSheets: string[];
  sync: SheetSyncResult;
  sheets: SheetReport[];
  skipped: SpreadsheetApiError[];
  /** Transactions whose account has no ledger tab. */
  unplaced: number;
}

function shareTotals(transactions: readonly Transaction[]): { primary: number; secondary: number } {
  const primary: number[] = [];
  const secondary: number[] = [];
  for (const tx of transactions) {
    const cost = signedAmount(tx.amount, tx.transactionType);
    if (cost === null) continue;
    const shares = computeSplitShares(cost, tx.isSplit ?? 0);
    primary.push(shares.primary);
    secondary.push(shares.secondary);
  }
  return { primary: sumAmounts(primary), secondary: sumAmounts(secondary) };
}

export async function reconcileWorkbook(
  doc: SpreadsheetDocument,
  transactions: readonly Transaction[],
  options: ReconcileOptions = {}
): Promise<WorkbookReport> {
  const parties = options.parties ?? DEFAULT_PARTIES;
  const logger = options.logger ?? silentLogger;

  const targetSheets = buildTargetSheets(transactions, parties);
  logger.info(`Target sheets for '${doc.title}': ${targetSheets.join(', ')}`);

  const sync = await applySheetSync(doc, targetSheets, logger);
  const sheetIds = new Map(sync.sheets.map((s) => [s.title, s.id]));

  const groups = groupByAccount(transactions);
  const ledgerTitles = targetSheets.filter((title) => isLedgerRole(sheetRole(title, parties)));
  let unplaced = 0;
  for (const [account, group] of groups) {
    if (!ledgerTitles.includes(account)) {
      unplaced += group.length;
      logger.warn(`Skipping ${group.length} transactions with no ledger sheet (account '${account || 'none'}')`);
    }
  }

  const report: WorkbookReport = {
    spreadsheetUrl: doc.url,
    targetSheets,
    sync,
    sheets: [],
    skipped: [],
    unplaced,
  };

  for (const title of targetSheets) {
    const role = sheetRole(title, parties);
    let operation = 'listSheets';
    try {
      const sheetId = sheetIds.get(title);
      if (sheetId === undefined) {
        throw new Error('sheet does not exist after sync');
      }

      const headers = headersFor(role, parties);
      if (headers !== null) {
        operation = 'updateValues';
        await doc.updateValues(title, 'A1', [headers]);
        operation = 'freezeRows';
        await doc.freezeRows(sheetId, 1);
      }

      const sheetReport: SheetReport = { title, role, rowsWritten: 0, primaryTotal: 0, secondaryTotal: 0 };

      const group = isLedgerRole(role) ? groups.get(title) ?? [] : [];
      if (group.length > 0) {
        const lastRow = FIRST_DATA_ROW + group.length - 1;
        logger.info(`Writing ${group.length} rows to '${title}'`);
        operation = 'clearValues';
        await doc.clearValues(title, `A${FIRST_DATA_ROW}:${columnLetter(LEDGER_LAST_COLUMN)}`);
        operation = 'updateValues';
        await doc.updateValues(title, `A${FIRST_DATA_ROW}`, buildLedgerRows(group));
        operation = 'setFormulas';
        await doc.setFormulas(
          sheetId,
          splitShareCells(FIRST_DATA_ROW, lastRow, role === 'secondary-ledger' ? 'nested-if' : 'choose')
        );
        operation = 'clearValidation';
        await doc.clearValidation(sheetId, FIRST_DATA_ROW, LEDGER_LAST_COLUMN);
        operation = 'setListValidation';
        for (const rule of ledgerValidations(lastRow, parties)) {
          await doc.setListValidation(sheetId, rule);
        }
        const totals = shareTotals(group);
        sheetReport.rowsWritten = group.length;
        sheetReport.primaryTotal = totals.primary;
        sheetReport.secondaryTotal = totals.secondary;
      }

      if (role === 'recon' && options.reconFormulas === true) {
        operation = 'clearValues';
        for (const range of RECON_FORMULA_RANGES) {
          await doc.clearValues(title, range);
        }
        operation = 'setFormulas';
        await doc.setFormulas(sheetId, finalReconFormulas(ledgerTitles));
        logger.info(`Applied aggregation formulas to '${title}'`);
      }

      report.sheets.push(sheetReport);
    } catch (err) {
      const error = err instanceof SpreadsheetApiError ? err : new SpreadsheetApiError(operation, title, err);
      logger.error(`Skipping sheet '${title}': ${describeError(error)}`);
      report.skipped.push(error);
    }
  }

  logger.info(
    `Reconciled ${report.sheets.length} of ${targetSheets.length} sheets` +
      (report.skipped.length > 0 ? `, ${report.skipped.length} skipped` : '')
  );
  return report;
}
