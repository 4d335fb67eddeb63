import { google, type Auth, type sheets_v4 } from 'googleapis';
import { sheetRange } from '../a1.js';
import {
  SpreadsheetApiError,
  type CellValue,
  type FormulaCell,
  type ListValidation,
  type SheetInfo,
  type SpreadsheetDocument,
} from '../document.js';

export interface SpreadsheetMetadata {
  id: string;
  title: string;
  url: string;
}

/**
 * {@link SpreadsheetDocument} over the Sheets v4 API. Values are written
 * with `USER_ENTERED`, so the API parses numbers, dates and formulas the way
 * the web UI would.
 */
export class GoogleSpreadsheetDocument implements SpreadsheetDocument {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  private readonly api: sheets_v4.Sheets;

  constructor(api: sheets_v4.Sheets, metadata: SpreadsheetMetadata) {
    this.api = api;
    this.id = metadata.id;
    this.title = metadata.title;
    this.url = metadata.url;
  }

  static async open(auth: Auth.OAuth2Client, spreadsheetId: string): Promise<GoogleSpreadsheetDocument> {
    const api = google.sheets({ version: 'v4', auth });
    const res = await api.spreadsheets.get({
      spreadsheetId,
      fields: 'spreadsheetId,spreadsheetUrl,properties.title',
    });
    return new GoogleSpreadsheetDocument(api, {
      id: res.data.spreadsheetId ?? spreadsheetId,
      title: res.data.properties?.title ?? '',
      url: res.data.spreadsheetUrl ?? `https://docs.google.com/spreadsheets/d/${spreadsheetId}/edit`,
    });
  }

  private async call<T>(operation: string, sheetTitle: string | null, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new SpreadsheetApiError(operation, sheetTitle, err);
    }
  }

  private async batchUpdate(
    operation: string,
    sheetTitle: string | null,
    requests: sheets_v4.Schema$Request[]
  ): Promise<sheets_v4.Schema$BatchUpdateSpreadsheetResponse> {
    return this.call(operation, sheetTitle, async () => {
      const res = await this.api.spreadsheets.batchUpdate({
        spreadsheetId: this.id,
        requestBody: { requests },
      });
      return res.data;
    });
  }

  async listSheets(): Promise<SheetInfo[]> {
    const data = await this.call('listSheets', null, async () => {
      const res = await this.api.spreadsheets.get({
        spreadsheetId: this.id,
        fields: 'sheets.properties(sheetId,title,index)',
      });
      return res.data;
    });

    const sheets: SheetInfo[] = [];
    for (const sheet of data.sheets ?? []) {
      const props = sheet.properties;
      if (props?.sheetId == null || props.title == null) continue;
      sheets.push({ id: props.sheetId, title: props.title, index: props.index ?? sheets.length });
    }
    return sheets.sort((a, b) => a.index - b.index);
  }

  async addSheet(title: string): Promise<SheetInfo> {
    const data = await this.batchUpdate('addSheet', title, [{ addSheet: { properties: { title } } }]);
    const props = data.replies?.[0]?.addSheet?.properties;
    if (props?.sheetId == null) {
      throw new SpreadsheetApiError('addSheet', title, 'response did not include the new sheet id');
    }
    return { id: props.sheetId, title: props.title ?? title, index: props.index ?? 0 };
  }

  async deleteSheet(sheetId: number): Promise<void> {
    await this.batchUpdate('deleteSheet', null, [{ deleteSheet: { sheetId } }]);
  }

  async renameSheet(sheetId: number, title: string): Promise<void> {
    await this.batchUpdate('renameSheet', title, [
      { updateSheetProperties: { properties: { sheetId, title }, fields: 'title' } },
    ]);
  }

  async reorderSheets(sheetIds: readonly number[]): Promise<void> {
    await this.batchUpdate(
      'reorderSheets',
      null,
      sheetIds.map((sheetId, index) => ({
        updateSheetProperties: { properties: { sheetId, index }, fields: 'index' },
      }))
    );
  }

  async updateValues(sheetTitle: string, range: string, rows: readonly (readonly CellValue[])[]): Promise<void> {
    await this.call('updateValues', sheetTitle, () =>
      this.api.spreadsheets.values.update({
        spreadsheetId: this.id,
        range: sheetRange(sheetTitle, range),
        valueInputOption: 'USER_ENTERED',
        requestBody: { values: rows.map((row) => [...row]) },
      })
    );
  }

  async clearValues(sheetTitle: string, range: string): Promise<void> {
    await this.call('clearValues', sheetTitle, () =>
      this.api.spreadsheets.values.clear({
        spreadsheetId: this.id,
        range: sheetRange(sheetTitle, range),
        requestBody: {},
      })
    );
  }

  async freezeRows(sheetId: number, count: number): Promise<void> {
    await this.batchUpdate('freezeRows', null, [
      {
        updateSheetProperties: {
          properties: { sheetId, gridProperties: { frozenRowCount: count } },
          fields: 'gridProperties.frozenRowCount',
        },
      },
    ]);
  }

  async setFormulas(sheetId: number, cells: readonly FormulaCell[]): Promise<void> {
    if (cells.length === 0) return;
    await this.batchUpdate(
      'setFormulas',
      null,
      cells.map((cell) => ({
        updateCells: {
          range: gridRange(sheetId, cell.row, cell.row, cell.column),
          rows: [{ values: [{ userEnteredValue: { formulaValue: cell.formula } }] }],
          fields: 'userEnteredValue',
        },
      }))
    );
  }

  async setListValidation(sheetId: number, rule: ListValidation): Promise<void> {
    await this.batchUpdate('setListValidation', null, [
      {
        setDataValidation: {
          range: gridRange(sheetId, rule.startRow, rule.endRow, rule.column),
          rule: {
            condition: {
              type: 'ONE_OF_LIST',
              values: rule.values.map((value) => ({ userEnteredValue: value })),
            },
            inputMessage: rule.inputMessage,
            strict: rule.strict,
            showCustomUi: rule.showCustomUi,
          },
        },
      },
    ]);
  }

  async clearValidation(sheetId: number, fromRow: number, lastColumn: number): Promise<void> {
    // no endRowIndex: the range runs to the bottom of the sheet, and no rule clears it
    await this.batchUpdate('clearValidation', null, [
      {
        setDataValidation: {
          range: { sheetId, startRowIndex: fromRow - 1, startColumnIndex: 0, endColumnIndex: lastColumn },
        },
      },
    ]);
  }
}

/** 1-based inclusive rows and a single 1-based column to a 0-based, end-exclusive GridRange. */
function gridRange(sheetId: number, startRow: number, endRow: number, column: number): sheets_v4.Schema$GridRange {
  return {
    sheetId,
    startRowIndex: startRow - 1,
    endRowIndex: endRow,
    startColumnIndex: column - 1,
    endColumnIndex: column,
  };
}
