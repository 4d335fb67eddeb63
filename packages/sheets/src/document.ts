export interface SheetInfo {
  id: number;
  title: string;
  /** 0-based position in the tab strip */
  index: number;
}

export type CellValue = string | number;

/** A formula for one cell; row and column are 1-based. */
export interface FormulaCell {
  row: number;
  column: number;
  formula: string;
}

/** Dropdown validation over a block of cells; rows and columns are 1-based and inclusive. */
export interface ListValidation {
  startRow: number;
  endRow: number;
  column: number;
  values: readonly string[];
  inputMessage: string;
  strict: boolean;
  showCustomUi: boolean;
}

/**
 * The operations the reconciliation engine needs from a spreadsheet.
 * Values are written as if typed by a user, so strings starting with `=`
 * become formulas.
 */
export interface SpreadsheetDocument {
  readonly id: string;
  readonly title: string;
  readonly url: string;

  listSheets(): Promise<SheetInfo[]>;
  addSheet(title: string): Promise<SheetInfo>;
  deleteSheet(sheetId: number): Promise<void>;
  renameSheet(sheetId: number, title: string): Promise<void>;
  /** Moves every listed sheet to its position in `sheetIds`, in one request. */
  reorderSheets(sheetIds: readonly number[]): Promise<void>;

  /** `range` is A1 without the sheet prefix, e.g. `A2:G10`. */
  updateValues(sheetTitle: string, range: string, rows: readonly (readonly CellValue[])[]): Promise<void>;
  clearValues(sheetTitle: string, range: string): Promise<void>;
  freezeRows(sheetId: number, count: number): Promise<void>;
  setFormulas(sheetId: number, cells: readonly FormulaCell[]): Promise<void>;
  setListValidation(sheetId: number, rule: ListValidation): Promise<void>;
  /** Removes every validation rule from `fromRow` down, columns A..`lastColumn`. */
  clearValidation(sheetId: number, fromRow: number, lastColumn: number): Promise<void>;
}

export class SpreadsheetApiError extends Error {
  readonly operation: string;
  readonly sheetTitle: string | null;

  constructor(operation: string, sheetTitle: string | null, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(sheetTitle === null ? `${operation} failed: ${detail}` : `${operation} on '${sheetTitle}' failed: ${detail}`);
    this.name = 'SpreadsheetApiError';
    this.operation = operation;
    this.sheetTitle = sheetTitle;
  }
}
