/**
 * In-memory spreadsheet for development and testing.
 * Records every mutating call so tests can assert what a run changed.
 */

import { cellA1, parseRange } from './a1.js';
import type { CellValue, FormulaCell, ListValidation, SheetInfo, SpreadsheetDocument } from './document.js';

export type DocumentOperationType =
  | 'addSheet'
  | 'deleteSheet'
  | 'renameSheet'
  | 'reorderSheets'
  | 'updateValues'
  | 'clearValues'
  | 'freezeRows'
  | 'setFormulas'
  | 'setListValidation'
  | 'clearValidation';

export interface DocumentOperation {
  type: DocumentOperationType;
  /** Sheet title at the time of the call; empty for whole-document calls. */
  sheet: string;
}

interface SheetState {
  id: number;
  title: string;
  cells: Map<string, CellValue>;
  frozenRows: number;
  validations: ListValidation[];
}

export interface InMemorySpreadsheetOptions {
  id?: string;
  title?: string;
  /** Initial tab titles (default: a single `Sheet1`). */
  sheets?: readonly string[];
  /** Return true to make a call throw, e.g. to simulate an API error on one sheet. */
  failWhen?: (operation: DocumentOperation) => boolean;
}

export class InMemorySpreadsheetDocument implements SpreadsheetDocument {
  readonly id: string;
  readonly title: string;
  readonly operations: DocumentOperation[] = [];
  private sheets: SheetState[] = [];
  private nextSheetId = 0;
  private readonly failWhen: (operation: DocumentOperation) => boolean;

  constructor(options: InMemorySpreadsheetOptions = {}) {
    this.id = options.id ?? 'memory-spreadsheet';
    this.title = options.title ?? 'Untitled spreadsheet';
    this.failWhen = options.failWhen ?? (() => false);
    for (const title of options.sheets ?? ['Sheet1']) {
      this.sheets.push(this.newSheet(title));
    }
  }

  get url(): string {
    return `memory://spreadsheets/${this.id}`;
  }

  private newSheet(title: string): SheetState {
    return { id: this.nextSheetId++, title, cells: new Map(), frozenRows: 0, validations: [] };
  }

  private record(type: DocumentOperationType, sheet: string): void {
    const operation = { type, sheet };
    if (this.failWhen(operation)) {
      throw new Error(`Simulated failure: ${type} on '${sheet}'`);
    }
    this.operations.push(operation);
  }

  private byId(sheetId: number): SheetState {
    const sheet = this.sheets.find((s) => s.id === sheetId);
    if (sheet === undefined) throw new Error(`No sheet with id ${sheetId}`);
    return sheet;
  }

  private byTitle(title: string): SheetState {
    const sheet = this.sheets.find((s) => s.title === title);
    if (sheet === undefined) throw new Error(`Unable to parse range: no sheet named '${title}'`);
    return sheet;
  }

  async listSheets(): Promise<SheetInfo[]> {
    return this.sheets.map((s, index) => ({ id: s.id, title: s.title, index }));
  }

  async addSheet(title: string): Promise<SheetInfo> {
    this.record('addSheet', title);
    if (this.sheets.some((s) => s.title === title)) {
      throw new Error(`A sheet with the name "${title}" already exists`);
    }
    const sheet = this.newSheet(title);
    this.sheets.push(sheet);
    return { id: sheet.id, title, index: this.sheets.length - 1 };
  }

  async deleteSheet(sheetId: number): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('deleteSheet', sheet.title);
    if (this.sheets.length === 1) {
      throw new Error("You can't remove all the sheets in a document");
    }
    this.sheets = this.sheets.filter((s) => s.id !== sheetId);
  }

  async renameSheet(sheetId: number, title: string): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('renameSheet', sheet.title);
    sheet.title = title;
  }

  async reorderSheets(sheetIds: readonly number[]): Promise<void> {
    this.record('reorderSheets', '');
    const ordered = sheetIds.map((id) => this.byId(id));
    const rest = this.sheets.filter((s) => !sheetIds.includes(s.id));
    this.sheets = [...ordered, ...rest];
  }

  async updateValues(sheetTitle: string, range: string, rows: readonly (readonly CellValue[])[]): Promise<void> {
    this.record('updateValues', sheetTitle);
    const sheet = this.byTitle(sheetTitle);
    const { startRow, startColumn } = parseRange(range);
    rows.forEach((row, r) => {
      row.forEach((value, c) => {
        this.writeCell(sheet, startRow + r, startColumn + c, value);
      });
    });
  }

  async clearValues(sheetTitle: string, range: string): Promise<void> {
    this.record('clearValues', sheetTitle);
    const sheet = this.byTitle(sheetTitle);
    const bounds = parseRange(range);
    for (const key of [...sheet.cells.keys()]) {
      const [row, column] = key.split(':').map(Number);
      if (row === undefined || column === undefined) continue;
      const rowInRange = row >= bounds.startRow && (bounds.endRow === null || row <= bounds.endRow);
      const colInRange = column >= bounds.startColumn && column <= bounds.endColumn;
      if (rowInRange && colInRange) sheet.cells.delete(key);
    }
  }

  async freezeRows(sheetId: number, count: number): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('freezeRows', sheet.title);
    sheet.frozenRows = count;
  }

  async setFormulas(sheetId: number, cells: readonly FormulaCell[]): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('setFormulas', sheet.title);
    for (const cell of cells) {
      this.writeCell(sheet, cell.row, cell.column, cell.formula);
    }
  }

  async setListValidation(sheetId: number, rule: ListValidation): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('setListValidation', sheet.title);
    sheet.validations = sheet.validations.flatMap((v) =>
      v.column === rule.column ? withoutRows(v, rule.startRow, rule.endRow) : [v]
    );
    sheet.validations.push(rule);
  }

  async clearValidation(sheetId: number, fromRow: number, lastColumn: number): Promise<void> {
    const sheet = this.byId(sheetId);
    this.record('clearValidation', sheet.title);
    sheet.validations = sheet.validations.flatMap((v) =>
      v.column <= lastColumn ? withoutRows(v, fromRow, null) : [v]
    );
  }

  private writeCell(sheet: SheetState, row: number, column: number, value: CellValue): void {
    const key = `${row}:${column}`;
    if (value === '') {
      sheet.cells.delete(key);
    } else {
      sheet.cells.set(key, value);
    }
  }

  // ─── Inspection helpers ────────────────────────────────────────────────────

  sheetTitles(): string[] {
    return this.sheets.map((s) => s.title);
  }

  /** Cell value by A1 reference, `''` when empty. */
  getCell(sheetTitle: string, a1: string): CellValue {
    const sheet = this.byTitle(sheetTitle);
    const { startRow, startColumn } = parseRange(a1);
    return sheet.cells.get(`${startRow}:${startColumn}`) ?? '';
  }

  /** A row from column A to `lastColumn`, empty cells as `''`. */
  getRow(sheetTitle: string, row: number, lastColumn: number): CellValue[] {
    const values: CellValue[] = [];
    for (let column = 1; column <= lastColumn; column++) {
      values.push(this.getCell(sheetTitle, cellA1(row, column)));
    }
    return values;
  }

  /** Highest row holding any value, 0 for an empty sheet. */
  lastRow(sheetTitle: string): number {
    const sheet = this.byTitle(sheetTitle);
    let last = 0;
    for (const key of sheet.cells.keys()) {
      const row = Number(key.split(':')[0]);
      if (row > last) last = row;
    }
    return last;
  }

  frozenRows(sheetTitle: string): number {
    return this.byTitle(sheetTitle).frozenRows;
  }

  validations(sheetTitle: string): readonly ListValidation[] {
    return this.byTitle(sheetTitle).validations;
  }

  /** Clears the operation log, e.g. between two runs in a test. */
  resetOperations(): void {
    this.operations.length = 0;
  }
}

/** What is left of `rule` once rows `from`..`to` lose their validation; `to` null means to the bottom. */
function withoutRows(rule: ListValidation, from: number, to: number | null): ListValidation[] {
  const kept: ListValidation[] = [];
  if (rule.startRow < from) {
    kept.push({ ...rule, endRow: Math.min(rule.endRow, from - 1) });
  }
  if (to !== null && rule.endRow > to) {
    kept.push({ ...rule, startRow: Math.max(rule.startRow, to + 1) });
  }
  return kept;
}
