import { roundToTwoDecimals, type SplitFlag } from '@monthbook/types';
import { columnLetter } from './a1.js';
import type { FormulaCell } from './document.js';
import { LEDGER_COLUMNS } from './layout.js';

/** Split flag -> [primary share, secondary share] of the cost. */
export const SPLIT_SHARES: Readonly<Record<SplitFlag, readonly [number, number]>> = {
  0: [1, 0],
  1: [0.5, 0.5],
  2: [0, 1],
};

const SPLIT_FLAGS: readonly SplitFlag[] = [0, 1, 2];

export type FormulaVariant = 'nested-if' | 'choose';

export interface SplitShares {
  primary: number;
  secondary: number;
}

/** What the H and I formulas evaluate to for one row. */
export function computeSplitShares(cost: number, split: SplitFlag): SplitShares {
  const [primary, secondary] = SPLIT_SHARES[split];
  return {
    primary: roundToTwoDecimals(cost * primary),
    secondary: roundToTwoDecimals(cost * secondary),
  };
}

function shareTerm(cost: string, share: number): string {
  if (share === 0) return '0';
  if (share === 1) return cost;
  return `${cost}/${1 / share}`;
}

function nestedIf(cost: string, split: string, side: 0 | 1): string {
  return SPLIT_FLAGS.reduceRight(
    (otherwise, flag) => `IF(${split}=${flag},${shareTerm(cost, SPLIT_SHARES[flag][side])},${otherwise})`,
    '0'
  );
}

function choose(cost: string, split: string, side: 0 | 1): string {
  const shares = SPLIT_FLAGS.map((flag) => SPLIT_SHARES[flag][side]).join(',');
  return `IFERROR(${cost}*CHOOSE(${split}+1,${shares}),0)`;
}

/**
 * Formulas for the primary (H) and secondary (I) share columns of `row`.
 * The secondary party's ledger uses nested IFs; every other ledger uses CHOOSE.
 */
export function splitShareFormulas(row: number, variant: FormulaVariant): [string, string] {
  const cost = `${columnLetter(LEDGER_COLUMNS.cost)}${row}`;
  const split = `${columnLetter(LEDGER_COLUMNS.isSplit)}${row}`;
  const build = variant === 'nested-if' ? nestedIf : choose;
  return [`=${build(cost, split, 0)}`, `=${build(cost, split, 1)}`];
}

export function splitShareCells(startRow: number, endRow: number, variant: FormulaVariant): FormulaCell[] {
  const cells: FormulaCell[] = [];
  for (let row = startRow; row <= endRow; row++) {
    const [primary, secondary] = splitShareFormulas(row, variant);
    cells.push({ row, column: LEDGER_COLUMNS.primaryShare, formula: primary });
    cells.push({ row, column: LEDGER_COLUMNS.secondaryShare, formula: secondary });
  }
  return cells;
}
