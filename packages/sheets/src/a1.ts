/**
 * A1 notation helpers. Rows and columns here are 1-based, as in A1.
 */

export function columnLetter(column: number): string {
  if (!Number.isInteger(column) || column < 1) {
    throw new Error(`Invalid column number: ${column}`);
  }
  let n = column;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function columnNumber(letters: string): number {
  if (!/^[A-Z]+$/.test(letters)) {
    throw new Error(`Invalid column letters: ${letters}`);
  }
  let n = 0;
  for (const ch of letters) {
    n = n * 26 + (ch.charCodeAt(0) - 64);
  }
  return n;
}

export function cellA1(row: number, column: number): string {
  return `${columnLetter(column)}${row}`;
}

/** Quotes a sheet title for use in a formula or range (`'Final Recon'`). */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export function sheetRange(title: string, range: string): string {
  return `${quoteSheetTitle(title)}!${range}`;
}

export interface CellRange {
  startRow: number;
  startColumn: number;
  /** null for an open-ended range such as `A2:I` */
  endRow: number | null;
  endColumn: number;
}

/** Parses `A1`, `A1:I1` or `A2:I` (no sheet prefix). */
export function parseRange(range: string): CellRange {
  const match = /^([A-Z]+)(\d+)(?::([A-Z]+)(\d+)?)?$/.exec(range);
  if (match === null) {
    throw new Error(`Unsupported range: ${range}`);
  }
  const [, startCol, startRow, endCol, endRow] = match;
  if (startCol === undefined || startRow === undefined) {
    throw new Error(`Unsupported range: ${range}`);
  }
  const startColumn = columnNumber(startCol);
  const start = Number(startRow);
  if (endCol === undefined) {
    return { startRow: start, startColumn, endRow: start, endColumn: startColumn };
  }
  return {
    startRow: start,
    startColumn,
    endRow: endRow === undefined ? null : Number(endRow),
    endColumn: columnNumber(endCol),
  };
}
