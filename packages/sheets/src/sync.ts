/**
 * Converges a spreadsheet's tab set onto a target list of titles: rename a
 * fresh `Sheet1`, add what is missing, delete what is not wanted, then put
 * the tabs in target order. Running it twice changes nothing the second time.
 */

import { describeError, silentLogger, type Logger } from '@monthbook/types';
import { SpreadsheetApiError, type SheetInfo, type SpreadsheetDocument } from './document.js';
import { DEFAULT_SHEET_TITLE } from './layout.js';

export interface SheetRename {
  sheetId: number;
  from: string;
  to: string;
}

export interface SheetSyncPlan {
  rename: SheetRename | null;
  toAdd: string[];
  toDelete: SheetInfo[];
  /** A sheet that would have been deleted but is the last one left. */
  protectedFromDeletion: SheetInfo | null;
  order: string[];
}

export function planSheetSync(existing: readonly SheetInfo[], target: readonly string[]): SheetSyncPlan {
  const existingTitles = new Set(existing.map((s) => s.title));
  const targetTitles = new Set(target);
  const missing = target.filter((title) => !existingTitles.has(title));

  let rename: SheetRename | null = null;
  const lone = existing.length === 1 ? existing[0] : undefined;
  const firstMissing = missing[0];
  if (lone !== undefined && lone.title === DEFAULT_SHEET_TITLE && !targetTitles.has(lone.title) && firstMissing !== undefined) {
    rename = { sheetId: lone.id, from: lone.title, to: firstMissing };
  }

  const toAdd = rename === null ? missing : missing.slice(1);
  let toDelete = existing.filter((s) => !targetTitles.has(s.title) && s.id !== rename?.sheetId);

  let protectedFromDeletion: SheetInfo | null = null;
  const survivors = existing.length - toDelete.length + toAdd.length;
  if (survivors === 0) {
    protectedFromDeletion = toDelete[toDelete.length - 1] ?? null;
    toDelete = toDelete.slice(0, -1);
  }

  return { rename, toAdd, toDelete, protectedFromDeletion, order: [...target] };
}

export interface SheetSyncResult {
  renamed: SheetRename | null;
  added: string[];
  deleted: string[];
  reordered: boolean;
  errors: SpreadsheetApiError[];
  /** Tabs after the sync, in document order. */
  sheets: SheetInfo[];
}

function sameOrder(current: readonly SheetInfo[], desired: readonly SheetInfo[]): boolean {
  return current.length === desired.length && current.every((s, i) => s.id === desired[i]?.id);
}

/**
 * Applies {@link planSheetSync} to `doc`. A failed rename, add or delete is
 * logged and recorded; the rest of the plan still runs.
 */
export async function applySheetSync(
  doc: SpreadsheetDocument,
  target: readonly string[],
  logger: Logger = silentLogger
): Promise<SheetSyncResult> {
  const existing = await doc.listSheets();
  const plan = planSheetSync(existing, target);
  const result: SheetSyncResult = { renamed: null, added: [], deleted: [], reordered: false, errors: [], sheets: [] };

  const fail = (operation: string, sheet: string | null, err: unknown): void => {
    const error = err instanceof SpreadsheetApiError ? err : new SpreadsheetApiError(operation, sheet, err);
    logger.error(error.message);
    result.errors.push(error);
  };

  if (plan.rename !== null) {
    try {
      logger.info(`Renaming '${plan.rename.from}' to '${plan.rename.to}'`);
      await doc.renameSheet(plan.rename.sheetId, plan.rename.to);
      result.renamed = plan.rename;
    } catch (err) {
      fail('renameSheet', plan.rename.from, err);
    }
  }

  for (const title of plan.toAdd) {
    try {
      logger.info(`Adding sheet '${title}'`);
      await doc.addSheet(title);
      result.added.push(title);
    } catch (err) {
      fail('addSheet', title, err);
    }
  }

  let remaining = existing.length + result.added.length;
  for (const sheet of plan.toDelete) {
    if (remaining <= 1) {
      logger.warn(`Keeping '${sheet.title}': it is the only sheet left`);
      continue;
    }
    try {
      logger.info(`Deleting sheet '${sheet.title}' (not in target list)`);
      await doc.deleteSheet(sheet.id);
      result.deleted.push(sheet.title);
      remaining--;
    } catch (err) {
      fail('deleteSheet', sheet.title, err);
    }
  }
  if (plan.protectedFromDeletion !== null) {
    logger.warn(`Keeping '${plan.protectedFromDeletion.title}': it is the only sheet left`);
  }

  const current = await doc.listSheets();
  const rank = new Map(plan.order.map((title, i) => [title, i]));
  const desired = [...current].sort(
    (a, b) => (rank.get(a.title) ?? plan.order.length) - (rank.get(b.title) ?? plan.order.length) || a.index - b.index
  );

  if (sameOrder(current, desired)) {
    result.sheets = current;
  } else {
    try {
      logger.info('Reordering sheets');
      await doc.reorderSheets(desired.map((s) => s.id));
      result.reordered = true;
      result.sheets = desired.map((s, index) => ({ ...s, index }));
    } catch (err) {
      fail('reorderSheets', null, err);
      result.sheets = current;
    }
  }

  return result;
}
