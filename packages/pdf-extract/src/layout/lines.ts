/**
 * Row reconstruction from positioned text items.
 */

export interface PositionedText {
  str: string;
  /** Left edge in PDF units */
  x: number;
  /** Baseline in PDF units, origin bottom-left */
  y: number;
  width: number;
}

export const LINE_TOLERANCES = {
  /** Items within this Y distance share a row */
  rowY: 2.0,
  /** Gap wider than this becomes a space */
  space: 2.5,
  /** Gap wider than this becomes a tab (column break) */
  column: 18,
} as const;

/**
 * Groups items into rows top to bottom and joins each row left to right,
 * separating words by a space and table columns by a tab.
 */
export function buildLinesFromItems(items: readonly PositionedText[]): string[] {
  if (items.length === 0) return [];

  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: { y: number; items: PositionedText[] }[] = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    if (lastRow !== undefined && Math.abs(item.y - lastRow.y) <= LINE_TOLERANCES.rowY) {
      lastRow.items.push(item);
    } else {
      rows.push({ y: item.y, items: [item] });
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.items.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;
    for (const item of row.items) {
      if (item.str === '') continue;
      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > LINE_TOLERANCES.column) {
          out += '\t';
        } else if (gap > LINE_TOLERANCES.space) {
          out += ' ';
        }
      }
      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned !== '') lines.push(cleaned);
  }

  return lines;
}
