import { describe, it, expect } from 'vitest';
import { cellA1, columnLetter, columnNumber, parseRange, quoteSheetTitle, sheetRange } from '@monthbook/sheets';

describe('A1 helpers', () => {
  it('should convert column numbers to letters', () => {
    expect(columnLetter(1)).toBe('A');
    expect(columnLetter(26)).toBe('Z');
    expect(columnLetter(27)).toBe('AA');
    expect(columnLetter(52)).toBe('AZ');
    expect(columnLetter(703)).toBe('AAA');
  });

  it('should convert letters back to numbers', () => {
    expect(columnNumber('I')).toBe(9);
    expect(columnNumber('AA')).toBe(27);
  });

  it('should reject invalid columns', () => {
    expect(() => columnLetter(0)).toThrow('Invalid column number: 0');
    expect(() => columnNumber('a1')).toThrow('Invalid column letters: a1');
  });

  it('should build cell references', () => {
    expect(cellA1(2, 8)).toBe('H2');
  });

  it('should quote sheet titles', () => {
    expect(quoteSheetTitle('Final Recon')).toBe("'Final Recon'");
    expect(quoteSheetTitle("Sam's Card")).toBe("'Sam''s Card'");
    expect(sheetRange('HDFC Savings', 'A2:I')).toBe("'HDFC Savings'!A2:I");
  });

  it('should parse single cells, closed and open-ended ranges', () => {
    expect(parseRange('A1')).toEqual({ startRow: 1, startColumn: 1, endRow: 1, endColumn: 1 });
    expect(parseRange('B2:D10')).toEqual({ startRow: 2, startColumn: 2, endRow: 10, endColumn: 4 });
    expect(parseRange('A2:I')).toEqual({ startRow: 2, startColumn: 1, endRow: null, endColumn: 9 });
    expect(() => parseRange('Sheet1!A1')).toThrow('Unsupported range: Sheet1!A1');
  });
});
