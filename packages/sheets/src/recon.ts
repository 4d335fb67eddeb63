import { quoteSheetTitle } from './a1.js';
import type { FormulaCell } from './document.js';

/** Ranges the Final Recon formulas own; cleared before they are rewritten. */
export const RECON_FORMULA_RANGES = ['A2:F', 'H2:K'] as const;

function escapeStringLiteral(value: string): string {
  return value.replace(/"/g, '""');
}

function sourceBlock(title: string): string {
  const ref = quoteSheetTitle(title);
  return (
    `FILTER({ARRAYFORMULA(IF(LEN(${ref}!C2:C),"${escapeStringLiteral(title)}",)), ` +
    `${ref}!C2:C, ${ref}!H2:H, ${ref}!I2:I, ${ref}!E2:E, ${ref}!F2:F}, ` +
    `LEN(${ref}!C2:C)>0)`
  );
}

/**
 * Stacks every ledger's categorised rows into Final Recon columns A..F:
 * source sheet, category, the two party shares, description and cost.
 */
export function buildFinalReconQuery(sourceSheets: readonly string[]): string {
  if (sourceSheets.length === 0) {
    return '="No source sheets found"';
  }
  const stacked = `{${sourceSheets.map(sourceBlock).join('; ')}}`;
  return `=IFERROR(QUERY(${stacked}, "SELECT Col1, Col2, Col3, Col4, Col5, Col6 WHERE Col2 IS NOT NULL", 0), "No data found")`;
}

/** A2 aggregation plus the per-category summary block in H2:K2. */
export function finalReconFormulas(sourceSheets: readonly string[]): FormulaCell[] {
  return [
    { row: 2, column: 1, formula: buildFinalReconQuery(sourceSheets) },
    { row: 2, column: 8, formula: '=IFERROR(UNIQUE(FILTER(B2:B, B2:B<>"")), "")' },
    { row: 2, column: 9, formula: '=IF(H2<>"", SUMIFS(C2:C, B2:B, H2), "")' },
    { row: 2, column: 10, formula: '=IF(H2<>"", SUMIFS(D2:D, B2:B, H2), "")' },
    { row: 2, column: 11, formula: '=IF(H2<>"", SUM(I2:J2), "")' },
  ];
}
