import { describe, it, expect } from 'vitest';
import { InMemorySpreadsheetDocument } from '@monthbook/sheets';

describe('InMemorySpreadsheetDocument', () => {
  it('should start with a single Sheet1', async () => {
    const doc = new InMemorySpreadsheetDocument();
    expect(await doc.listSheets()).toEqual([{ id: 0, title: 'Sheet1', index: 0 }]);
  });

  it('should refuse to delete the last sheet', async () => {
    const doc = new InMemorySpreadsheetDocument();
    await expect(doc.deleteSheet(0)).rejects.toThrow("You can't remove all the sheets in a document");
  });

  it('should refuse a duplicate title', async () => {
    const doc = new InMemorySpreadsheetDocument({ sheets: ['Cash'] });
    await expect(doc.addSheet('Cash')).rejects.toThrow('A sheet with the name "Cash" already exists');
  });

  it('should write and clear values by range', async () => {
    const doc = new InMemorySpreadsheetDocument({ sheets: ['Cash'] });
    await doc.updateValues('Cash', 'A1', [
      ['a', 'b', 'c'],
      ['d', 'e', 'f'],
      ['g', 'h', 'i'],
    ]);
    await doc.clearValues('Cash', 'B2:C2');

    expect(doc.getRow('Cash', 2, 3)).toEqual(['d', '', '']);
    expect(doc.getRow('Cash', 3, 3)).toEqual(['g', 'h', 'i']);

    await doc.clearValues('Cash', 'A2:C');
    expect(doc.lastRow('Cash')).toBe(1);
  });

  it('should keep validation rules per row range', async () => {
    const doc = new InMemorySpreadsheetDocument({ sheets: ['Cash'] });
    const rule = { column: 3, values: ['Food'], inputMessage: 'Select a category', strict: true, showCustomUi: true };
    await doc.setListValidation(0, { ...rule, startRow: 2, endRow: 10 });
    await doc.setListValidation(0, { ...rule, startRow: 4, endRow: 5 });
    expect(doc.validations('Cash').map((v) => [v.startRow, v.endRow])).toEqual([
      [2, 3],
      [6, 10],
      [4, 5],
    ]);

    await doc.clearValidation(0, 7, 9);
    expect(doc.validations('Cash').map((v) => [v.startRow, v.endRow])).toEqual([
      [2, 3],
      [6, 6],
      [4, 5],
    ]);
  });

  it('should not log a call that was made to fail', async () => {
    const doc = new InMemorySpreadsheetDocument({ failWhen: (op) => op.type === 'freezeRows' });
    await expect(doc.freezeRows(0, 1)).rejects.toThrow("Simulated failure: freezeRows on 'Sheet1'");
    expect(doc.operations).toEqual([]);
    expect(doc.frozenRows('Sheet1')).toBe(0);
  });
});
