import { google, type Auth, type drive_v3 } from 'googleapis';
import { monthName, silentLogger, type AccountingMonth, type Logger } from '@monthbook/types';
import { GoogleSpreadsheetDocument } from './sheets-document.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/** `Accounts-2024-March` */
export function workbookName(month: AccountingMonth): string {
  return `Accounts-${month.year}-${monthName(month)}`;
}

/** Escapes a value for a Drive `q` string literal. */
export function driveQueryLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

async function findFile(
  drive: drive_v3.Drive,
  parentId: string,
  name: string,
  mimeType: string
): Promise<string | null> {
  const res = await drive.files.list({
    q: [
      `name = ${driveQueryLiteral(name)}`,
      `${driveQueryLiteral(parentId)} in parents`,
      `mimeType = '${mimeType}'`,
      'trashed = false',
    ].join(' and '),
    spaces: 'drive',
    fields: 'files(id, name)',
  });
  return res.data.files?.[0]?.id ?? null;
}

async function findOrCreate(
  drive: drive_v3.Drive,
  parentId: string,
  name: string,
  mimeType: string,
  logger: Logger
): Promise<string> {
  const existing = await findFile(drive, parentId, name, mimeType);
  if (existing !== null) {
    logger.info(`Found '${name}' (${existing})`);
    return existing;
  }

  logger.info(`'${name}' not found in ${parentId}, creating it`);
  const res = await drive.files.create({
    requestBody: { name, mimeType, parents: [parentId] },
    fields: 'id',
  });
  const id = res.data.id;
  if (id === null || id === undefined) {
    throw new Error(`Drive did not return an id for '${name}'`);
  }
  return id;
}

export interface OpenWorkbookOptions {
  /** Drive folder holding one sub-folder per year. */
  budgetFolderId: string;
  month: AccountingMonth;
  logger?: Logger;
}

/**
 * Opens `Accounts-YYYY-Month` in the year folder under the budget folder,
 * creating the folder and the spreadsheet when missing. A new spreadsheet
 * starts with a single `Sheet1`.
 */
export async function openMonthlyWorkbook(
  auth: Auth.OAuth2Client,
  options: OpenWorkbookOptions
): Promise<GoogleSpreadsheetDocument> {
  const logger = options.logger ?? silentLogger;
  const drive = google.drive({ version: 'v3', auth });

  const yearFolderId = await findOrCreate(drive, options.budgetFolderId, String(options.month.year), FOLDER_MIME_TYPE, logger);
  const name = workbookName(options.month);
  const spreadsheetId = await findOrCreate(drive, yearFolderId, name, SPREADSHEET_MIME_TYPE, logger);

  return GoogleSpreadsheetDocument.open(auth, spreadsheetId);
}
